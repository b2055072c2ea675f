import chalk from "chalk";
import { PassThrough } from "node:stream";
import { afterEach, beforeAll, describe, expect, it } from "vitest";
import { runChat, type ChatDeps } from "../commands/chat.js";
import { buildHelpMessage } from "../lib/commands.js";
import { StreamTransport } from "../sdk/adapters/stream.js";
import { resolveConfig } from "../sdk/config.js";
import { ConnectionError } from "../sdk/errors.js";
import { ChatSession } from "../sdk/session.js";
import { acceptAll, createStreamServer, until, type StreamResponder } from "./helpers/fake-server.js";

const config = resolveConfig({ transport: "tcp", host: "localhost" });
const inputs: PassThrough[] = [];

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  for (const input of inputs.splice(0)) input.destroy();
});

function harness(respond: StreamResponder = acceptAll) {
  const server = createStreamServer(respond);
  const input = new PassThrough();
  inputs.push(input);
  const printed: string[] = [];
  const hooks: { interrupt?: () => void } = {};
  const deps: ChatDeps = {
    connect: () =>
      Promise.resolve(
        new ChatSession({
          transport: new StreamTransport(server.client),
          replyTimeoutMs: 200,
          shutdownBudgets: { notifyMs: 200, flushMs: 200, closeMs: 200, totalMs: 600 },
        }),
      ),
    input,
    print: (line) => printed.push(line),
    onInterrupt: (handler) => {
      hooks.interrupt = handler;
      return () => {
        hooks.interrupt = undefined;
      };
    },
  };
  return { ...server, input, printed, hooks, deps };
}

describe("runChat", () => {
  it("authenticates, sends a message and says goodbye at end of input", async () => {
    const { input, printed, received, deps } = harness();
    input.end("/auth bob test-secret Bob\nhello everyone\n");

    expect(await runChat(config, deps)).toBe(0);
    expect(printed).toEqual(["Action Success: Auth success"]);
    expect(received).toEqual(["AUTH bob AS Bob USING test-secret", "MSG FROM Bob IS hello everyone", "BYE FROM Bob"]);
  });

  it("prints local errors and keeps reading", async () => {
    const { input, printed, received, deps } = harness();
    input.end("hello\n/join\n/shout\n\n");

    expect(await runChat(config, deps)).toBe(0);
    expect(printed).toEqual([
      "ERROR: You must authenticate first (/auth)",
      "ERROR: Usage: /join <channel>",
      "ERROR: Unknown command. Use /help for available commands",
    ]);
    expect(received).toEqual([]);
  });

  it("prints help", async () => {
    const { input, printed, deps } = harness();
    input.end("/help\n");
    await runChat(config, deps);
    expect(printed).toEqual([buildHelpMessage()]);
  });

  it("fails when it cannot connect", async () => {
    const printed: string[] = [];
    const code = await runChat(config, {
      connect: () => Promise.reject(new ConnectionError("Could not connect to localhost:4567: connect ECONNREFUSED")),
      input: new PassThrough(),
      print: (line) => printed.push(line),
      onInterrupt: () => () => {},
    });

    expect(code).toBe(1);
    expect(printed).toEqual(["ERROR: Could not connect to localhost:4567: connect ECONNREFUSED"]);
  });

  it("stops reading and fails when the server reports an error", async () => {
    const { input, printed, received, deps } = harness((line) =>
      line.startsWith("AUTH ") ? ["REPLY OK IS Auth success", "ERR FROM Server IS going down"] : [],
    );
    input.write("/auth bob test-secret Bob\n");

    expect(await runChat(config, deps)).toBe(1);
    expect(printed).toEqual(["Action Success: Auth success", "ERROR FROM Server: going down"]);
    expect(received).toEqual(["AUTH bob AS Bob USING test-secret"]);
  });

  it("leaves gracefully on interrupt", async () => {
    const { input, printed, received, hooks, deps } = harness();
    input.write("/auth bob test-secret Bob\n");

    const running = runChat(config, deps);
    await until(() => printed.length === 1);
    hooks.interrupt?.();

    expect(await running).toBe(0);
    expect(received).toEqual(["AUTH bob AS Bob USING test-secret", "BYE FROM Bob"]);
    expect(hooks.interrupt).toBeUndefined();
  });
});
