/**
 * chatline SDK, a client for a line-oriented chat protocol over TCP or UDP.
 *
 * @example Quick start
 * ```ts
 * import { connectSession, resolveConfig } from "chatline";
 *
 * const session = await connectSession(resolveConfig({ transport: "udp", host: "localhost" }));
 * await session.authenticate("alice", "Alice", "test-secret");
 * await session.join("general");
 * await session.sendMessage("hello");
 * await session.leave();
 * ```
 *
 * @module
 */

// ── Primary API ─────────────────────────────────────────────────────
export { connectSession, openTransport, type ConnectOptions } from "./client.js";
export { ChatSession, type ChatSessionOptions } from "./session.js";
export {
  resolveConfig,
  describeConfig,
  ClientConfigSchema,
  type ClientConfig,
  type ClientConfigInput,
  type TransportKind,
} from "./config.js";
export type { SessionEffect, ReplyOutcome } from "./effects.js";
export type { ShutdownReport, StageOutcome } from "./shutdown.js";

// ── Effect Matching ─────────────────────────────────────────────────
export {
  matchEffect,
  isEffectType,
  assertNever,
  type SessionEffectType,
  type EffectOfType,
  type SessionEffectVisitor,
} from "./match.js";

// ── Errors ──────────────────────────────────────────────────────────
export {
  ChatError,
  ConnectionError,
  InvalidFieldError,
  InvalidStateError,
  TimeoutError,
  ClientClosedError,
  isChatError,
  isErrorCode,
  type ChatErrorCode,
} from "./errors.js";

// ── Low-level (advanced usage) ──────────────────────────────────────
export { checkField, assertField, toPrintable, MAX_CONTENT_LENGTH, type FieldKind } from "./fields.js";
export { encodeStreamFrame, parseStreamLine, decodeStreamLine, LineFramer, MAX_LINE_LENGTH } from "./codec/stream.js";
export { encodeDatagram, decodeDatagram, peekHeader, type DatagramFrame } from "./codec/datagram.js";
export { normalizeDatagram } from "./codec/normalize.js";
export { ReliabilityEngine } from "./reliability.js";
export { StreamTransport } from "./adapters/stream.js";
export { DatagramTransport } from "./adapters/datagram.js";
export type { ProtocolTransport } from "./adapters/adapter.js";
export type { StreamLink, DatagramLink, Disposable } from "./transport/transport.js";
export type { NormalizedMessage, InboundEvent, SendReport, PeerAddress } from "./protocol.js";
