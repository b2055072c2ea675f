/**
 * Protocol vocabulary shared by codecs, transports and the session.
 *
 * @module
 */

import type { ChatError } from "./errors.js";

// ── Normalized inbound messages ─────────────────────────────────────

/** A chat line from another participant. */
export interface ChatMessage {
  readonly kind: "chat";
  readonly sender: string;
  readonly content: string;
}

/** Outcome of the outstanding request. Carries no operation tag. */
export interface ReplyMessage {
  readonly kind: "reply";
  readonly success: boolean;
  readonly content: string;
}

/** The peer reports a fault and ends the session. */
export interface ErrorMessage {
  readonly kind: "error";
  readonly sender: string;
  readonly content: string;
}

/** The peer ends the session. */
export interface FarewellMessage {
  readonly kind: "farewell";
  readonly sender: string;
}

/**
 * Transport-independent inbound event. Both wire formats decode into this
 * shape through the same text decoder.
 */
export type NormalizedMessage = ChatMessage | ReplyMessage | ErrorMessage | FarewellMessage;

/** A frame that could not be interpreted. */
export interface Malformed {
  readonly kind: "malformed";
  readonly reason: string;
}

/** What a transport hands upward to the session. */
export type InboundEvent =
  | { readonly type: "message"; readonly message: NormalizedMessage }
  | { readonly type: "malformed"; readonly reason: string }
  | { readonly type: "fault"; readonly error: ChatError };

// ── Outbound ────────────────────────────────────────────────────────

/** Client → server operations, in the order their fields go on the wire. */
export type OutboundFrame =
  | { readonly type: "auth"; readonly username: string; readonly displayName: string; readonly secret: string }
  | { readonly type: "join"; readonly channel: string; readonly displayName: string }
  | { readonly type: "msg"; readonly displayName: string; readonly content: string }
  | { readonly type: "bye"; readonly displayName: string }
  | { readonly type: "err"; readonly displayName: string; readonly content: string };

/** Result of handing one outbound frame to a transport. */
export interface SendReport {
  /** Datagram identifier; null on the stream transport. */
  readonly messageId: number | null;
  /** False when the retry budget ran out before an acknowledgment. */
  readonly confirmed: boolean;
  /** Number of times the bytes went out. */
  readonly transmissions: number;
  /** True when an abort signal cut the acknowledgment wait short. */
  readonly aborted: boolean;
}

/** Options accepted by every send operation. */
export interface SendOptions {
  /** Ends an acknowledgment wait early without treating it as a failure. */
  signal?: AbortSignal;
}

// ── Datagram addressing ─────────────────────────────────────────────

/** Where datagrams are sent to, or came from. */
export interface PeerAddress {
  readonly address: string;
  readonly port: number;
}

/** Format an address for logs. */
export function formatAddress(peer: PeerAddress): string {
  return peer.address.includes(":") ? `[${peer.address}]:${peer.port}` : `${peer.address}:${peer.port}`;
}

/** Structural equality of two addresses. */
export function sameAddress(a: PeerAddress, b: PeerAddress): boolean {
  return a.address === b.address && a.port === b.port;
}

/** Channel every client lands in after authenticating. */
export const DEFAULT_CHANNEL = "default";
