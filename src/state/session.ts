/**
 * Session slice: the protocol state machine.
 *
 * Pure transitions only; sending frames and timing replies is the job of
 * `ChatSession`, which calls these actions while holding its lock.
 *
 * ```
 * init ──auth──▶ authenticating ──OK──▶ open ◀──reply── joinPending
 *   ▲                 │                  │ ──join──────────▲
 *   └──NOK/timeout────┘                  ▼
 *                                   terminated
 * ```
 *
 * @module
 */

import type { StateCreator } from "zustand/vanilla";
import { DEFAULT_CHANNEL } from "../sdk/protocol.js";
import type {
  PendingRequest,
  SessionCommand,
  SessionPhase,
  SessionSnapshot,
  TerminationReason,
} from "./types.js";

// ── Slice state + actions ────────────────────────────────────────

/** What a reply settled. */
export interface ReplyResolution {
  readonly request: PendingRequest;
  readonly success: boolean;
  /** Channel confirmed by a successful reply. */
  readonly channel: string | null;
}

export interface SessionSlice extends SessionSnapshot {
  /** Enter `authenticating` and adopt the display name. */
  beginAuthentication: (displayName: string) => void;
  /** Enter `joinPending` for `channel`. */
  beginJoin: (channel: string) => void;
  /** Settle the outstanding request. Null when there is none. */
  resolveReply: (success: boolean) => ReplyResolution | null;
  /** Drop the outstanding request and revert its state. Returns what was dropped. */
  expireRequest: () => PendingRequest | null;
  /** Change the local display name. */
  rename: (displayName: string) => void;
  /** Enter `terminated`. False if already terminated. */
  terminate: (reason: TerminationReason) => boolean;
}

// ── Rules ────────────────────────────────────────────────────────

/**
 * Why `command` is not allowed in `state`, or null when it is.
 * Field grammar is checked separately.
 */
export function commandRejection(state: SessionSnapshot, command: SessionCommand): string | null {
  if (state.phase === "terminated") return "Session has ended";

  switch (command) {
    case "authenticate":
      if (state.pendingRequest === "authentication") return "Authentication already in progress";
      if (state.authenticated) return "Already authenticated";
      if (state.phase !== "init") return "Cannot authenticate now";
      return null;
    case "join":
      if (!state.authenticated) return "You must authenticate first (/auth)";
      if (state.pendingRequest === "join") return "Join already in progress";
      if (state.phase !== "open") return "Cannot join now";
      return null;
    case "message":
      if (!state.authenticated) return "You must authenticate first (/auth)";
      if (state.phase !== "open" && state.phase !== "joinPending") return "Cannot send messages now";
      return null;
    case "rename":
      return null;
  }
}

/** Whether the session can still exchange frames. */
export function isLive(phase: SessionPhase): boolean {
  return phase !== "terminated";
}

// ── Slice creator ────────────────────────────────────────────────

export const initialSessionState: SessionSnapshot = {
  phase: "init",
  authenticated: false,
  displayName: null,
  pendingRequest: null,
  pendingChannel: null,
  confirmedChannel: null,
  terminationReason: null,
};

export const createSessionSlice: StateCreator<SessionSlice, [], [], SessionSlice> = (set, get) => ({
  ...initialSessionState,

  beginAuthentication: (displayName) => {
    set({ phase: "authenticating", pendingRequest: "authentication", displayName });
  },

  beginJoin: (channel) => {
    set({ phase: "joinPending", pendingRequest: "join", pendingChannel: channel });
  },

  resolveReply: (success) => {
    const { pendingRequest, pendingChannel, confirmedChannel } = get();
    if (pendingRequest === null) return null;

    if (pendingRequest === "authentication") {
      if (success) {
        set({
          phase: "open",
          authenticated: true,
          pendingRequest: null,
          confirmedChannel: DEFAULT_CHANNEL,
        });
        return { request: pendingRequest, success, channel: DEFAULT_CHANNEL };
      }
      set({ phase: "init", pendingRequest: null });
      return { request: pendingRequest, success, channel: null };
    }

    set({
      phase: "open",
      pendingRequest: null,
      pendingChannel: null,
      confirmedChannel: success ? pendingChannel : confirmedChannel,
    });
    return { request: pendingRequest, success, channel: success ? pendingChannel : null };
  },

  expireRequest: () => {
    const { pendingRequest, phase } = get();
    if (pendingRequest === null || phase === "terminated") return null;
    if (pendingRequest === "authentication") {
      set({ phase: "init", pendingRequest: null });
    } else {
      set({ phase: "open", pendingRequest: null, pendingChannel: null });
    }
    return pendingRequest;
  },

  rename: (displayName) => {
    set({ displayName });
  },

  terminate: (reason) => {
    if (get().phase === "terminated") return false;
    set({ phase: "terminated", pendingRequest: null, pendingChannel: null, terminationReason: reason });
    return true;
  },
});
