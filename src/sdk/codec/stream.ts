/**
 * Text codec for the byte-stream transport.
 *
 * One frame per line, CRLF terminated:
 *
 * ```
 * AUTH {username} AS {displayName} USING {secret}
 * JOIN {channel} AS {displayName}
 * MSG FROM {displayName} IS {content}
 * BYE FROM {displayName}
 * ERROR FROM {displayName} IS {content}
 * REPLY {OK|NOK} IS {content}
 * ```
 *
 * The decoder is also the single interpretation point for the datagram
 * transport, which re-renders its frames into this text before decoding.
 *
 * @module
 */

import { assertField, firstInvalidField, MAX_CONTENT_LENGTH } from "../fields.js";
import type { Malformed, NormalizedMessage, OutboundFrame } from "../protocol.js";

/** Frame terminator on the stream transport. */
export const CRLF = "\r\n";

/** Server → client reply frame. */
export interface ReplyFrame {
  readonly type: "reply";
  readonly success: boolean;
  readonly content: string;
}

/** Any frame expressible on the stream transport. */
export type StreamFrame = OutboundFrame | ReplyFrame;

// ── Encoding ────────────────────────────────────────────────────────

/** Render a frame as one CRLF-terminated line. Throws on invalid fields. */
export function encodeStreamFrame(frame: StreamFrame): string {
  return renderStreamFrame(frame) + CRLF;
}

/** Render a frame as text without the terminator. Throws on invalid fields. */
export function renderStreamFrame(frame: StreamFrame): string {
  switch (frame.type) {
    case "auth":
      assertField("username", frame.username);
      assertField("displayName", frame.displayName);
      assertField("secret", frame.secret);
      return `AUTH ${frame.username} AS ${frame.displayName} USING ${frame.secret}`;
    case "join":
      assertField("channel", frame.channel);
      assertField("displayName", frame.displayName);
      return `JOIN ${frame.channel} AS ${frame.displayName}`;
    case "msg":
      assertField("displayName", frame.displayName);
      assertField("content", frame.content);
      return `MSG FROM ${frame.displayName} IS ${frame.content}`;
    case "bye":
      assertField("displayName", frame.displayName);
      return `BYE FROM ${frame.displayName}`;
    case "err":
      assertField("displayName", frame.displayName);
      assertField("content", frame.content);
      return `ERROR FROM ${frame.displayName} IS ${frame.content}`;
    case "reply":
      assertField("content", frame.content);
      return `REPLY ${frame.success ? "OK" : "NOK"} IS ${frame.content}`;
  }
}

// ── Decoding ────────────────────────────────────────────────────────

const AUTH_RE = /^AUTH (\S+) AS (\S+) USING (\S+)$/;
const JOIN_RE = /^JOIN (\S+) AS (\S+)$/;
const MSG_RE = /^MSG FROM (\S+) IS ([\s\S]*)$/;
const BYE_RE = /^BYE FROM (\S+)$/;
const ERR_RE = /^(?:ERR|ERROR) FROM (\S+) IS ([\s\S]*)$/;
const REPLY_RE = /^REPLY (OK|NOK) IS ([\s\S]*)$/;

function malformed(reason: string): Malformed {
  return { kind: "malformed", reason };
}

/** Type guard for the malformed outcome of the decoders. */
export function isMalformed<T extends object>(value: T | Malformed): value is Malformed {
  return "kind" in value && value.kind === "malformed";
}

/**
 * Parse one line (terminator already stripped) into a frame. Unknown leading
 * tokens, shape mismatches and field violations all come back as
 * {@link Malformed}.
 */
export function parseStreamLine(line: string): StreamFrame | Malformed {
  const token = line.split(" ", 1)[0] ?? "";

  switch (token) {
    case "AUTH": {
      const m = AUTH_RE.exec(line);
      if (!m) return malformed("invalid AUTH frame");
      const [, username = "", displayName = "", secret = ""] = m;
      const problem = firstInvalidField([
        ["username", username],
        ["displayName", displayName],
        ["secret", secret],
      ]);
      if (problem) return malformed(problem);
      return { type: "auth", username, displayName, secret };
    }
    case "JOIN": {
      const m = JOIN_RE.exec(line);
      if (!m) return malformed("invalid JOIN frame");
      const [, channel = "", displayName = ""] = m;
      const problem = firstInvalidField([
        ["channel", channel],
        ["displayName", displayName],
      ]);
      if (problem) return malformed(problem);
      return { type: "join", channel, displayName };
    }
    case "MSG": {
      const m = MSG_RE.exec(line);
      if (!m) return malformed("invalid MSG frame");
      const [, displayName = "", content = ""] = m;
      const problem = firstInvalidField([
        ["displayName", displayName],
        ["content", content],
      ]);
      if (problem) return malformed(problem);
      return { type: "msg", displayName, content };
    }
    case "BYE": {
      const m = BYE_RE.exec(line);
      if (!m) return malformed("invalid BYE frame");
      const [, displayName = ""] = m;
      const problem = firstInvalidField([["displayName", displayName]]);
      if (problem) return malformed(problem);
      return { type: "bye", displayName };
    }
    case "ERR":
    case "ERROR": {
      const m = ERR_RE.exec(line);
      if (!m) return malformed("invalid ERROR frame");
      const [, displayName = "", content = ""] = m;
      const problem = firstInvalidField([
        ["displayName", displayName],
        ["content", content],
      ]);
      if (problem) return malformed(problem);
      return { type: "err", displayName, content };
    }
    case "REPLY": {
      const m = REPLY_RE.exec(line);
      if (!m) return malformed("invalid REPLY frame");
      const [, result = "", content = ""] = m;
      const problem = firstInvalidField([["content", content]]);
      if (problem) return malformed(problem);
      return { type: "reply", success: result === "OK", content };
    }
    default:
      return malformed(`unrecognized frame "${token.slice(0, 20)}"`);
  }
}

/**
 * Decode a line the peer sent into a {@link NormalizedMessage}. Client-only
 * frames (AUTH, JOIN) are malformed when they arrive from the peer.
 */
export function decodeStreamLine(line: string): NormalizedMessage | Malformed {
  const frame = parseStreamLine(line);
  if (isMalformed(frame)) return frame;

  switch (frame.type) {
    case "reply":
      return { kind: "reply", success: frame.success, content: frame.content };
    case "msg":
      return { kind: "chat", sender: frame.displayName, content: frame.content };
    case "err":
      return { kind: "error", sender: frame.displayName, content: frame.content };
    case "bye":
      return { kind: "farewell", sender: frame.displayName };
    case "auth":
    case "join":
      return malformed(`unexpected ${frame.type.toUpperCase()} frame from server`);
  }
}

// ── Framing ─────────────────────────────────────────────────────────

/** Longest line accepted: the largest content plus the longest frame prefix. */
export const MAX_LINE_LENGTH = MAX_CONTENT_LENGTH + 64;

/**
 * Splits a character stream into CRLF-terminated lines. A bare LF is part
 * of the content, not a terminator. A line longer than the limit comes back
 * as one {@link Malformed} and the rest of it, up to the next CRLF, is
 * dropped.
 */
export class LineFramer {
  readonly #maxLength: number;
  #buffer = "";
  #skipping = false;

  constructor(maxLength = MAX_LINE_LENGTH) {
    this.#maxLength = maxLength;
  }

  /** Append a chunk and return every line it completed. */
  push(chunk: string): Array<string | Malformed> {
    this.#buffer += chunk;
    const lines: Array<string | Malformed> = [];
    let end = this.#buffer.indexOf(CRLF);
    while (end >= 0) {
      const line = this.#buffer.slice(0, end);
      this.#buffer = this.#buffer.slice(end + CRLF.length);
      if (this.#skipping) this.#skipping = false;
      else lines.push(line.length > this.#maxLength ? this.#oversized() : line);
      end = this.#buffer.indexOf(CRLF);
    }

    if (this.#buffer.length > this.#maxLength) {
      if (!this.#skipping) lines.push(this.#oversized());
      this.#skipping = true;
      // keep a trailing CR: the LF may be in the next chunk
      this.#buffer = this.#buffer.endsWith("\r") ? "\r" : "";
    }
    return lines;
  }

  /** Characters received after the last terminator. */
  get pending(): string {
    return this.#buffer;
  }

  #oversized(): Malformed {
    return malformed(`line longer than ${this.#maxLength} characters`);
  }
}
