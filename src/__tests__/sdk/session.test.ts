import { describe, expect, it } from "vitest";
import { StreamTransport } from "../../sdk/adapters/stream.js";
import type { SessionEffect } from "../../sdk/effects.js";
import { InvalidFieldError, InvalidStateError } from "../../sdk/errors.js";
import { ChatSession } from "../../sdk/session.js";
import type { ShutdownBudgets } from "../../sdk/shutdown.js";
import { acceptAll, createStreamServer, until, type StreamResponder } from "../helpers/fake-server.js";

const FAST: ShutdownBudgets = { notifyMs: 200, flushMs: 200, closeMs: 200, totalMs: 600 };

function setup(respond: StreamResponder = acceptAll, replyTimeoutMs = 200) {
  const server = createStreamServer(respond);
  const session = new ChatSession({
    transport: new StreamTransport(server.client),
    replyTimeoutMs,
    shutdownBudgets: FAST,
  });
  const effects: SessionEffect[] = [];
  const pumped = (async () => {
    for await (const effect of session.effects()) effects.push(effect);
  })();
  return { ...server, session, effects, pumped };
}

describe("ChatSession authentication", () => {
  it("opens the session on a successful reply", async () => {
    const { session, received, effects } = setup();

    const outcome = await session.authenticate("bob", "Bob", "test-secret");

    expect(outcome).toEqual({ status: "success", content: "Auth success" });
    expect(received).toEqual(["AUTH bob AS Bob USING test-secret"]);
    await until(() => effects.length === 1);
    expect(session.state).toMatchObject({
      phase: "open",
      authenticated: true,
      displayName: "Bob",
      confirmedChannel: "default",
      pendingRequest: null,
    });
    expect(effects).toEqual([{ type: "reply", request: "authentication", success: true, content: "Auth success" }]);
  });

  it("takes the display name before the secret", async () => {
    const { session, received } = setup();
    await session.authenticate("bob", "Bob", "secret");

    expect(received).toEqual(["AUTH bob AS Bob USING secret"]);
    expect(session.state.displayName).toBe("Bob");
  });

  it("stays unauthenticated after a refusal and may retry", async () => {
    let attempts = 0;
    const { session } = setup((line) => {
      if (!line.startsWith("AUTH ")) return [];
      attempts++;
      return [attempts === 1 ? "REPLY NOK IS Bad secret" : "REPLY OK IS Auth success"];
    });

    expect(await session.authenticate("bob", "Bob", "wrong")).toEqual({ status: "failure", content: "Bad secret" });
    expect(session.state).toMatchObject({ phase: "init", authenticated: false });

    expect((await session.authenticate("bob", "Bob", "test-secret")).status).toBe("success");
  });

  it("rejects a second authentication", async () => {
    const { session, received } = setup();
    await session.authenticate("bob", "Bob", "test-secret");

    await expect(session.authenticate("bob", "Bob", "test-secret")).rejects.toThrow("Already authenticated");
    expect(received).toHaveLength(1);
  });

  it("rejects authentication while one is pending, then times out", async () => {
    const { session, effects } = setup(() => [], 50);
    const first = session.authenticate("bob", "Bob", "test-secret");

    const second = session.authenticate("bob", "Bob", "test-secret");
    await expect(second).rejects.toThrow("Authentication already in progress");
    await expect(second).rejects.toBeInstanceOf(InvalidStateError);

    expect(await first).toEqual({ status: "timeout", content: "" });
    expect(session.state).toMatchObject({ phase: "init", pendingRequest: null });
    await until(() => effects.length === 1);
    expect(effects).toEqual([{ type: "replyTimeout", request: "authentication" }]);
  });

  it("rejects fields that break their grammar without sending", async () => {
    const { session, received } = setup();
    await expect(session.authenticate("bob smith", "Bob", "test-secret")).rejects.toBeInstanceOf(InvalidFieldError);
    expect(received).toEqual([]);
    expect(session.state.phase).toBe("init");
  });
});

describe("ChatSession commands", () => {
  it("requires authentication before messages and joins", async () => {
    const { session, received } = setup();
    await expect(session.sendMessage("hi")).rejects.toThrow("You must authenticate first (/auth)");
    await expect(session.join("general")).rejects.toThrow("You must authenticate first (/auth)");
    expect(received).toEqual([]);
  });

  it("joins a channel", async () => {
    const { session, received } = setup();
    await session.authenticate("bob", "Bob", "test-secret");

    expect(await session.join("general")).toEqual({ status: "success", content: "Joined" });
    expect(received[1]).toBe("JOIN general AS Bob");
    expect(session.state).toMatchObject({ phase: "open", confirmedChannel: "general", pendingChannel: null });
  });

  it("keeps the current channel when a join is refused", async () => {
    const { session } = setup((line) =>
      line.startsWith("AUTH ") ? ["REPLY OK IS Auth success"] : ["REPLY NOK IS No such channel"],
    );
    await session.authenticate("bob", "Bob", "test-secret");

    expect(await session.join("secret")).toEqual({ status: "failure", content: "No such channel" });
    expect(session.state).toMatchObject({ phase: "open", confirmedChannel: "default" });
  });

  it("refuses an invalid channel name without sending", async () => {
    const { session, received } = setup();
    await session.authenticate("bob", "Bob", "test-secret");

    await expect(session.join("bad!channel")).rejects.toBeInstanceOf(InvalidFieldError);
    expect(received).toEqual(["AUTH bob AS Bob USING test-secret"]);
    expect(session.state.phase).toBe("open");
  });

  it("allows messages while a join is pending", async () => {
    const { session, received } = setup((line) => (line.startsWith("AUTH ") ? ["REPLY OK IS Auth success"] : []), 50);
    await session.authenticate("bob", "Bob", "test-secret");

    const join = session.join("slow");
    await session.sendMessage("still here");
    await until(() => received.length === 3);

    expect(received.slice(1)).toEqual(["JOIN slow AS Bob", "MSG FROM Bob IS still here"]);
    expect(await join).toEqual({ status: "timeout", content: "" });
    expect(session.state).toMatchObject({ phase: "open", confirmedChannel: "default" });
  });

  it("sends later frames under a new display name", async () => {
    const { session, received } = setup();
    await session.authenticate("bob", "Bob", "test-secret");
    await session.rename("Bobby");
    await session.sendMessage("hi");
    await until(() => received.length === 2);

    expect(received[1]).toBe("MSG FROM Bobby IS hi");
    expect(session.state.displayName).toBe("Bobby");
  });
});

describe("ChatSession inbound", () => {
  it("shows chat only after authentication", async () => {
    const { session, send, effects } = setup();
    await send("MSG FROM Ann IS early");
    await session.authenticate("bob", "Bob", "test-secret");
    await send("MSG FROM Ann IS late");
    await until(() => effects.length === 2);

    expect(effects[1]).toEqual({ type: "chat", sender: "Ann", content: "late" });
  });

  it("ends without a farewell when the server reports an error", async () => {
    const { session, send, received, effects, pumped } = setup();
    await session.authenticate("bob", "Bob", "test-secret");
    await send("ERR FROM Server IS boom");
    await until(() => session.state.phase === "terminated");

    const report = await session.leave();
    await pumped;

    expect(report).toMatchObject({ reason: "peer-error", notify: "skipped", close: "done" });
    expect(received).toEqual(["AUTH bob AS Bob USING test-secret"]);
    expect(effects.slice(1)).toEqual([
      { type: "peerError", sender: "Server", content: "boom" },
      { type: "terminated", reason: "peer-error" },
    ]);
  });

  it("ends quietly when the server says goodbye", async () => {
    const { session, send, received, effects, pumped } = setup();
    await session.authenticate("bob", "Bob", "test-secret");
    await send("BYE FROM Server");
    await until(() => session.state.phase === "terminated");
    await session.leave();
    await pumped;

    expect(session.state.terminationReason).toBe("peer-farewell");
    expect(received).toHaveLength(1);
    expect(effects.slice(1)).toEqual([
      { type: "peerFarewell", sender: "Server" },
      { type: "terminated", reason: "peer-farewell" },
    ]);
  });

  it("answers a malformed frame with an error and a farewell", async () => {
    const { session, send, received, effects, pumped } = setup();
    await session.authenticate("bob", "Bob", "test-secret");
    await send("HELLO world");
    await until(() => session.state.phase === "terminated");

    const report = await session.leave();
    await pumped;
    await until(() => received.length === 3);

    expect(report).toMatchObject({ reason: "protocol-fault", notify: "done" });
    expect(received.slice(1)).toEqual(['ERROR FROM Bob IS unrecognized frame "HELLO"', "BYE FROM Bob"]);
    expect(effects.slice(1)).toEqual([
      { type: "protocolFault", reason: 'unrecognized frame "HELLO"' },
      { type: "terminated", reason: "protocol-fault" },
    ]);
  });

  it("treats a reply with nothing outstanding as a protocol fault", async () => {
    const { session, send, received } = setup();
    await session.authenticate("bob", "Bob", "test-secret");
    await send("REPLY OK IS again");
    await until(() => received.length === 3);

    expect(session.state.terminationReason).toBe("protocol-fault");
    expect(received[1]).toBe("ERROR FROM Bob IS Unexpected REPLY with no request outstanding");
  });

  it("reports a lost connection", async () => {
    const { session, server, effects, pumped } = setup();
    await session.authenticate("bob", "Bob", "test-secret");
    await server.close();
    await pumped;

    expect(session.state.terminationReason).toBe("connection-lost");
    expect(effects.slice(1)).toEqual([
      { type: "connectionLost", message: "Connection closed by server" },
      { type: "terminated", reason: "connection-lost" },
    ]);
  });
});

describe("ChatSession.leave", () => {
  it("says goodbye once however often it is called", async () => {
    const { session, received, effects, pumped } = setup();
    await session.authenticate("bob", "Bob", "test-secret");

    const [first, second] = await Promise.all([session.leave(), session.leave("interrupt")]);
    await pumped;

    expect(second).toBe(first);
    expect(first).toMatchObject({ reason: "user", notify: "done", flush: "done", close: "done" });
    expect(received).toEqual(["AUTH bob AS Bob USING test-secret", "BYE FROM Bob"]);
    expect(effects.filter((e) => e.type === "terminated")).toEqual([{ type: "terminated", reason: "user" }]);
    await expect(session.sendMessage("too late")).rejects.toThrow("Session has ended");
  });

  it("sends nothing when leaving before authentication", async () => {
    const { session, received } = setup();
    const report = await session.leave("end-of-input");
    expect(report).toMatchObject({ reason: "end-of-input", notify: "skipped" });
    expect(received).toEqual([]);
  });

  it("settles a pending request as aborted", async () => {
    const { session } = setup(() => []);
    const pending = session.authenticate("bob", "Bob", "test-secret");
    await until(() => session.state.phase === "authenticating");
    await session.leave("interrupt");
    expect(await pending).toEqual({ status: "aborted", content: "" });
  });
});
