/**
 * `chatline -t <tcp|udp> -s <host>`: interactive line-oriented chat.
 *
 * Reads commands and messages from stdin, prints session output to stdout,
 * and leaves gracefully on end of input or Ctrl+C.
 */

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { errorMessage, buildHelpMessage, parseInput } from "../lib/commands.js";
import { formatEffect, formatError } from "../lib/output.js";
import { connectSession } from "../sdk/client.js";
import { describeConfig, type ClientConfig } from "../sdk/config.js";
import { createLogger } from "../sdk/log.js";
import type { ChatSession } from "../sdk/session.js";
import type { TerminationReason } from "../state/types.js";

export interface ChatDeps {
  readonly connect: (config: ClientConfig) => Promise<ChatSession>;
  readonly input: Readable;
  readonly print: (line: string) => void;
  /** Register an interrupt handler; returns its removal. */
  readonly onInterrupt: (handler: () => void) => () => void;
}

const defaultDeps: ChatDeps = {
  connect: (config) => connectSession(config),
  input: process.stdin,
  print: (line) => process.stdout.write(line + "\n"),
  onInterrupt: (handler) => {
    process.on("SIGINT", handler);
    return () => process.off("SIGINT", handler);
  },
};

/** Endings that count as a failure for the exit code. */
const FAULTS: ReadonlySet<TerminationReason> = new Set(["protocol-fault", "connection-lost", "peer-error"]);

/** Run the chat loop. Resolves with the process exit code. */
export async function runChat(config: ClientConfig, deps: ChatDeps = defaultDeps): Promise<number> {
  const log = createLogger("cli", config.verbose);
  log("starting %s", describeConfig(config));

  let session: ChatSession;
  try {
    session = await deps.connect(config);
  } catch (err) {
    deps.print(formatError(errorMessage(err)));
    return 1;
  }

  const printing = (async () => {
    for await (const effect of session.effects()) {
      const line = formatEffect(effect);
      if (line !== null) deps.print(line);
    }
  })();

  const rl = createInterface({ input: deps.input, terminal: false });
  const unsubscribe = session.store.subscribe((state) => {
    if (state.phase === "terminated") rl.close();
  });
  const removeInterrupt = deps.onInterrupt(() => {
    session.leave("interrupt").catch((err: unknown) => log("leave failed: %s", errorMessage(err)));
  });

  try {
    for await (const line of rl) {
      if (session.state.phase === "terminated") break;
      await handleLine(session, line, deps.print);
    }
  } finally {
    unsubscribe();
    removeInterrupt();
    rl.close();
  }

  const report = await session.leave("end-of-input");
  await printing;
  log("ended: %s", report.reason);
  return FAULTS.has(report.reason) ? 1 : 0;
}

async function handleLine(session: ChatSession, line: string, print: (line: string) => void): Promise<void> {
  const command = parseInput(line);
  try {
    switch (command.kind) {
      case "empty":
        return;
      case "invalid":
        print(formatError(command.message));
        return;
      case "help":
        print(buildHelpMessage());
        return;
      case "auth":
        await session.authenticate(command.username, command.displayName, command.secret);
        return;
      case "join":
        await session.join(command.channel);
        return;
      case "rename":
        await session.rename(command.displayName);
        return;
      case "message":
        await session.sendMessage(command.content);
        return;
    }
  } catch (err) {
    print(formatError(errorMessage(err)));
  }
}
