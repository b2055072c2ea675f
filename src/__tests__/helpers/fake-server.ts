/**
 * In-process stand-ins for the chat server, built on the memory links.
 */

import { decodeDatagram, encodeDatagram, type DatagramFrame } from "../../sdk/codec/datagram.js";
import { LineFramer } from "../../sdk/codec/stream.js";
import type { PeerAddress } from "../../sdk/protocol.js";
import {
  createMemoryDatagramPair,
  createMemoryStreamPair,
  type MemoryDatagramNetworkOptions,
} from "../../sdk/transport/memory.js";

export const tick = (ms = 0) => new Promise<void>((r) => setTimeout(r, ms));

/** Poll until `predicate` holds, failing after `timeoutMs`. */
export async function until(predicate: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await tick(1);
  }
}

/** Collect up to `n` items, then stop iterating. */
export async function take<T>(iterable: AsyncIterable<T>, n: number): Promise<T[]> {
  const out: T[] = [];
  if (n <= 0) return out;
  for await (const item of iterable) {
    out.push(item);
    if (out.length >= n) break;
  }
  return out;
}

/** Collect everything until the iterable ends. */
export async function drain<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

// ── Stream ──────────────────────────────────────────────────────────

/** Lines the server answers a received line with. */
export type StreamResponder = (line: string) => string[];

export function createStreamServer(respond: StreamResponder = () => []) {
  const [client, server] = createMemoryStreamPair();
  const received: string[] = [];
  const framer = new LineFramer();

  const send = (line: string): Promise<void> => server.send(line + "\r\n");

  server.onData((chunk) => {
    for (const line of framer.push(chunk)) {
      if (typeof line !== "string") continue;
      received.push(line);
      for (const out of respond(line)) void send(out);
    }
  });

  return { client, server, received, send };
}

/** Accepts any AUTH and JOIN. */
export const acceptAll: StreamResponder = (line) => {
  if (line.startsWith("AUTH ")) return ["REPLY OK IS Auth success"];
  if (line.startsWith("JOIN ")) return ["REPLY OK IS Joined"];
  return [];
};

// ── Datagram ────────────────────────────────────────────────────────

/** Frames the server answers a received frame with (confirms are automatic). */
export type DatagramResponder = (frame: DatagramFrame, nextId: () => number) => DatagramFrame[];

export interface DatagramServerOptions extends MemoryDatagramNetworkOptions {
  respond?: DatagramResponder;
  /** Confirm every frame the client sends. Default true. */
  confirm?: boolean;
}

export function createDatagramServer(opts: DatagramServerOptions = {}) {
  const pair = createMemoryDatagramPair({ drop: opts.drop });
  const received: DatagramFrame[] = [];
  let serverId = 0x100;
  const nextId = (): number => serverId++;

  const sendFrame = (frame: DatagramFrame, to: PeerAddress = pair.clientAddress): Promise<void> =>
    pair.server.send(encodeDatagram(frame), to);

  pair.server.onMessage(({ data, from }) => {
    const decoded = decodeDatagram(data);
    if (!decoded.ok) return;
    const { frame } = decoded;
    received.push(frame);
    if (frame.type === "confirm") return;
    if (opts.confirm ?? true) void sendFrame({ type: "confirm", messageId: frame.messageId }, from);
    for (const out of opts.respond?.(frame, nextId) ?? []) void sendFrame(out, from);
  });

  return { ...pair, received, sendFrame, nextId };
}

/** Replies OK to AUTH and JOIN. */
export const acceptAllDatagrams: DatagramResponder = (frame, nextId) => {
  if (frame.type === "auth") {
    return [{ type: "reply", messageId: nextId(), success: true, refMessageId: frame.messageId, content: "Auth success" }];
  }
  if (frame.type === "join") {
    return [{ type: "reply", messageId: nextId(), success: true, refMessageId: frame.messageId, content: "Joined" }];
  }
  return [];
};
