/**
 * Structured error hierarchy for the chatline client.
 *
 * All errors extend ChatError with a `.code` discriminant for programmatic
 * handling via switch statements or type predicates.
 *
 * @example
 * ```ts
 * try {
 *   await session.join("general");
 * } catch (e) {
 *   if (e instanceof ChatError) {
 *     switch (e.code) {
 *       case "INVALID_FIELD":  console.error(`Bad ${e.field}: ${e.message}`); break;
 *       case "INVALID_STATE":  console.error(e.message); break;
 *       case "CONNECTION_LOST": console.error("Server went away"); break;
 *     }
 *   }
 * }
 * ```
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

/** Union of all error codes for exhaustive switch handling. */
export type ChatErrorCode =
  | "CONNECTION_LOST"
  | "INVALID_FIELD"
  | "INVALID_STATE"
  | "TIMEOUT"
  | "CLIENT_CLOSED";

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/** Base error for all chatline errors. */
export class ChatError extends Error {
  readonly code: ChatErrorCode;
  readonly cause?: Error;

  constructor(code: ChatErrorCode, message: string, opts?: { cause?: Error }) {
    super(message);
    this.code = code;
    this.name = "ChatError";
    if (opts?.cause) this.cause = opts.cause;
  }
}

// ---------------------------------------------------------------------------
// Concrete errors
// ---------------------------------------------------------------------------

/** Connection refused, reset, or closed by the peer mid-session. */
export class ConnectionError extends ChatError {
  readonly code = "CONNECTION_LOST" as const;

  constructor(message: string, opts?: { cause?: Error }) {
    super("CONNECTION_LOST", message, opts);
    this.name = "ConnectionError";
  }
}

/** Names of the validated protocol fields. */
export type FieldKind = "username" | "channel" | "secret" | "displayName" | "content";

/** A username, secret, display name, channel or message broke its grammar. */
export class InvalidFieldError extends ChatError {
  readonly code = "INVALID_FIELD" as const;
  readonly field: FieldKind;

  constructor(field: FieldKind, message: string) {
    super("INVALID_FIELD", message);
    this.name = "InvalidFieldError";
    this.field = field;
  }
}

/** A command was issued in a session state that does not permit it. */
export class InvalidStateError extends ChatError {
  readonly code = "INVALID_STATE" as const;
  readonly state: string;

  constructor(state: string, message: string) {
    super("INVALID_STATE", message);
    this.name = "InvalidStateError";
    this.state = state;
  }
}

/** A bounded wait ran out. */
export class TimeoutError extends ChatError {
  readonly code = "TIMEOUT" as const;
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super("TIMEOUT", `${operation}: timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/** Transport or session was used after it shut down. */
export class ClientClosedError extends ChatError {
  readonly code = "CLIENT_CLOSED" as const;

  constructor() {
    super("CLIENT_CLOSED", "Client is closed");
    this.name = "ClientClosedError";
  }
}

// ---------------------------------------------------------------------------
// Type predicates
// ---------------------------------------------------------------------------

/** Narrow any caught value to a {@link ChatError}. */
export function isChatError(err: unknown): err is ChatError {
  return err instanceof ChatError;
}

/** Narrow to a specific error by code. */
export function isErrorCode<C extends ChatErrorCode>(
  err: unknown,
  code: C,
): err is ChatError & { code: C } {
  return err instanceof ChatError && err.code === code;
}

/** Coerce an unknown thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
