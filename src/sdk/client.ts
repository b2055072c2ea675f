/**
 * Wiring: configuration → link → adapter → session.
 */

import { DatagramTransport } from "./adapters/datagram.js";
import type { ProtocolTransport } from "./adapters/adapter.js";
import { StreamTransport } from "./adapters/stream.js";
import type { ClientConfig } from "./config.js";
import { createLogger } from "./log.js";
import { ChatSession } from "./session.js";
import type { ShutdownBudgets } from "./shutdown.js";
import { connectTcp } from "./transport/tcp.js";
import { openUdp } from "./transport/udp.js";

export interface ConnectOptions {
  /** Override the teardown deadlines. */
  readonly shutdownBudgets?: ShutdownBudgets;
}

/** Open the link the configuration names and wrap it in a protocol adapter. */
export async function openTransport(config: ClientConfig): Promise<ProtocolTransport> {
  switch (config.transport) {
    case "tcp": {
      const log = createLogger("tcp", config.verbose);
      const link = await connectTcp(config.host, config.port, { timeoutMs: config.connectTimeoutMs, log });
      return new StreamTransport(link, log);
    }
    case "udp": {
      const log = createLogger("udp", config.verbose);
      const { link, server } = await openUdp(config.host, config.port, log);
      return new DatagramTransport(link, {
        server,
        confirmTimeoutMs: config.confirmTimeoutMs,
        maxRetries: config.maxRetries,
        log,
        reliabilityLog: createLogger("reliability", config.verbose),
      });
    }
  }
}

/** Connect to the server and start a session. */
export async function connectSession(config: ClientConfig, opts: ConnectOptions = {}): Promise<ChatSession> {
  const transport = await openTransport(config);
  return new ChatSession({
    transport,
    replyTimeoutMs: config.replyTimeoutMs,
    log: createLogger("session", config.verbose),
    shutdownLog: createLogger("shutdown", config.verbose),
    shutdownBudgets: opts.shutdownBudgets,
  });
}
