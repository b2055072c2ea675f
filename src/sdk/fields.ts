/**
 * Field grammar shared by both wire formats.
 *
 * Every value that crosses the wire (usernames, secrets, display names,
 * channel ids, message content) is checked here, both before encoding an
 * outbound frame and after decoding an inbound one.
 *
 * @module
 */

import { z } from "zod";
import { InvalidFieldError, type FieldKind } from "./errors.js";

export type { FieldKind };

/** Largest message content accepted in either direction. */
export const MAX_CONTENT_LENGTH = 60_000;

const FIELD_SCHEMAS: Record<FieldKind, z.ZodType<string>> = {
  username: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,20}$/, "must be 1-20 characters of [A-Za-z0-9_-]"),
  channel: z
    .string()
    .regex(/^[A-Za-z0-9_.-]{1,20}$/, "must be 1-20 characters of [A-Za-z0-9_.-]"),
  secret: z
    .string()
    .regex(/^[A-Za-z0-9_-]{1,128}$/, "must be 1-128 characters of [A-Za-z0-9_-]"),
  displayName: z
    .string()
    .regex(/^[\x21-\x7E]{1,20}$/, "must be 1-20 printable ASCII characters without spaces"),
  content: z
    .string()
    .min(1, "must not be empty")
    .max(MAX_CONTENT_LENGTH, `must be at most ${MAX_CONTENT_LENGTH} characters`)
    .regex(/^[\x20-\x7E\n]*$/, "must be printable ASCII (newlines allowed)"),
};

const FIELD_LABELS: Record<FieldKind, string> = {
  username: "username",
  channel: "channel",
  secret: "secret",
  displayName: "display name",
  content: "message content",
};

/** Returns a description of the violation, or null when the value is valid. */
export function checkField(kind: FieldKind, value: string): string | null {
  const result = FIELD_SCHEMAS[kind].safeParse(value);
  if (result.success) return null;
  const issue = result.error.issues[0]?.message ?? "is invalid";
  return `Invalid ${FIELD_LABELS[kind]}: ${issue}`;
}

/** Throws {@link InvalidFieldError} when the value breaks its grammar. */
export function assertField(kind: FieldKind, value: string): void {
  const problem = checkField(kind, value);
  if (problem !== null) throw new InvalidFieldError(kind, problem);
}

/** Checks several fields in order and returns the first violation. */
export function firstInvalidField(
  fields: ReadonlyArray<readonly [FieldKind, string]>,
): string | null {
  for (const [kind, value] of fields) {
    const problem = checkField(kind, value);
    if (problem !== null) return problem;
  }
  return null;
}

/**
 * Squeeze arbitrary diagnostic text into valid message content, so local
 * error descriptions can be reported to the peer.
 */
export function toPrintable(text: string, max = 200): string {
  const cleaned = text.replace(/[^\x20-\x7E]/g, "?").slice(0, max);
  return cleaned.length > 0 ? cleaned : "?";
}
