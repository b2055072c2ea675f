/** Protocol state of the session. */
export type SessionPhase = "init" | "authenticating" | "open" | "joinPending" | "terminated";

/** The request a reply will resolve. */
export type PendingRequest = "authentication" | "join";

/** Local commands the state machine gates. */
export type SessionCommand = "authenticate" | "join" | "message" | "rename";

/** Why the session ended. */
export type TerminationReason =
  | "user"
  | "end-of-input"
  | "interrupt"
  | "peer-error"
  | "peer-farewell"
  | "protocol-fault"
  | "connection-lost";

/** Read-only view of the session fields. */
export interface SessionSnapshot {
  readonly phase: SessionPhase;
  readonly authenticated: boolean;
  readonly displayName: string | null;
  readonly pendingRequest: PendingRequest | null;
  readonly pendingChannel: string | null;
  readonly confirmedChannel: string | null;
  readonly terminationReason: TerminationReason | null;
}
