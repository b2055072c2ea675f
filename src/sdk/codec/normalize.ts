/**
 * Datagram → NormalizedMessage.
 *
 * Datagram frames are rendered into the stream transport's text form and
 * run through {@link decodeStreamLine}, so both transports share one
 * interpretation of every message.
 */

import { firstInvalidField, type FieldKind } from "../fields.js";
import type { Malformed, NormalizedMessage } from "../protocol.js";
import type { DatagramFrame } from "./datagram.js";
import { decodeStreamLine } from "./stream.js";

function render(fields: ReadonlyArray<readonly [FieldKind, string]>, line: string): string | Malformed {
  // A field that breaks its grammar could shift the text parse
  const problem = firstInvalidField(fields);
  return problem === null ? line : { kind: "malformed", reason: problem };
}

/** Canonical text of a datagram frame the peer may send, or why it can't have one. */
export function canonicalText(frame: DatagramFrame): string | Malformed {
  switch (frame.type) {
    case "reply":
      return render([["content", frame.content]], `REPLY ${frame.success ? "OK" : "NOK"} IS ${frame.content}`);
    case "msg":
      return render(
        [["displayName", frame.displayName], ["content", frame.content]],
        `MSG FROM ${frame.displayName} IS ${frame.content}`,
      );
    case "err":
      return render(
        [["displayName", frame.displayName], ["content", frame.content]],
        `ERROR FROM ${frame.displayName} IS ${frame.content}`,
      );
    case "bye":
      return render([["displayName", frame.displayName]], `BYE FROM ${frame.displayName}`);
    case "auth":
    case "join":
    case "confirm":
    case "ping":
      return { kind: "malformed", reason: `unexpected ${frame.type.toUpperCase()} frame from server` };
  }
}

/** Interpret a decoded datagram exactly as the stream transport would. */
export function normalizeDatagram(frame: DatagramFrame): NormalizedMessage | Malformed {
  const text = canonicalText(frame);
  if (typeof text !== "string") return text;
  return decodeStreamLine(text);
}
