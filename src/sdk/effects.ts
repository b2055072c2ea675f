/**
 * What the session reports upward: one stream of effects for the
 * presentation layer, plus the outcome of each request.
 */

import type { PendingRequest, TerminationReason } from "../state/types.js";

/** A reply settled the outstanding request. */
export interface ReplyEffect {
  readonly type: "reply";
  readonly request: PendingRequest;
  readonly success: boolean;
  readonly content: string;
}

/** No reply arrived in time; the request was abandoned. */
export interface ReplyTimeoutEffect {
  readonly type: "replyTimeout";
  readonly request: PendingRequest;
}

export interface ChatEffect {
  readonly type: "chat";
  readonly sender: string;
  readonly content: string;
}

export interface PeerErrorEffect {
  readonly type: "peerError";
  readonly sender: string;
  readonly content: string;
}

export interface PeerFarewellEffect {
  readonly type: "peerFarewell";
  readonly sender: string;
}

/** The peer sent something uninterpretable; the session is ending. */
export interface ProtocolFaultEffect {
  readonly type: "protocolFault";
  readonly reason: string;
}

export interface ConnectionLostEffect {
  readonly type: "connectionLost";
  readonly message: string;
}

export interface TerminatedEffect {
  readonly type: "terminated";
  readonly reason: TerminationReason;
}

export type SessionEffect =
  | ReplyEffect
  | ReplyTimeoutEffect
  | ChatEffect
  | PeerErrorEffect
  | PeerFarewellEffect
  | ProtocolFaultEffect
  | ConnectionLostEffect
  | TerminatedEffect;

/** How an authenticate or join ended. */
export interface ReplyOutcome {
  readonly status: "success" | "failure" | "timeout" | "aborted";
  /** Reply content; empty unless a reply arrived. */
  readonly content: string;
}
