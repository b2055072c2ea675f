/**
 * Binary codec for the datagram transport.
 *
 * ```
 * [type:1][messageId:2, big-endian][fields…]
 * ```
 *
 * Text fields are ASCII terminated by a zero byte. Reply frames carry a
 * result byte and the identifier of the request they answer ahead of their
 * content.
 *
 * @module
 */

import { assertField } from "../fields.js";
import type { OutboundFrame } from "../protocol.js";

export const DatagramType = {
  confirm: 0x00,
  reply: 0x01,
  auth: 0x02,
  join: 0x03,
  msg: 0x04,
  ping: 0xfd,
  err: 0xfe,
  bye: 0xff,
} as const;

export type DatagramTypeName = keyof typeof DatagramType;

const HEADER_LENGTH = 3;

type WithId<T> = T & { readonly messageId: number };

export type DatagramFrame =
  | WithId<OutboundFrame>
  | WithId<{ readonly type: "confirm" }>
  | WithId<{ readonly type: "ping" }>
  | WithId<{
      readonly type: "reply";
      readonly success: boolean;
      readonly refMessageId: number;
      readonly content: string;
    }>;

export interface DatagramHeader {
  readonly typeByte: number;
  readonly messageId: number;
}

export type DecodeResult =
  | { readonly ok: true; readonly frame: DatagramFrame }
  | { readonly ok: false; readonly reason: string; readonly header?: DatagramHeader };

const encoder = new TextEncoder();
const decoder = new TextDecoder("latin1");

/** Name of a type byte for logs, or its hex value when unknown. */
export function datagramTypeName(typeByte: number): string {
  for (const [name, value] of Object.entries(DatagramType)) {
    if (value === typeByte) return name.toUpperCase();
  }
  return `0x${typeByte.toString(16).padStart(2, "0")}`;
}

// ── Encoding ────────────────────────────────────────────────────────

/** Serialize a frame. Text fields are validated first. */
export function encodeDatagram(frame: DatagramFrame): Uint8Array {
  switch (frame.type) {
    case "confirm":
    case "ping":
      return header(DatagramType[frame.type], frame.messageId);
    case "reply": {
      assertField("content", frame.content);
      const prefix = new Uint8Array(3);
      prefix[0] = frame.success ? 1 : 0;
      writeId(prefix, 1, frame.refMessageId);
      return concat([header(DatagramType.reply, frame.messageId), prefix, field(frame.content)]);
    }
    case "auth":
      assertField("username", frame.username);
      assertField("displayName", frame.displayName);
      assertField("secret", frame.secret);
      return concat([
        header(DatagramType.auth, frame.messageId),
        field(frame.username),
        field(frame.displayName),
        field(frame.secret),
      ]);
    case "join":
      assertField("channel", frame.channel);
      assertField("displayName", frame.displayName);
      return concat([
        header(DatagramType.join, frame.messageId),
        field(frame.channel),
        field(frame.displayName),
      ]);
    case "msg":
    case "err":
      assertField("displayName", frame.displayName);
      assertField("content", frame.content);
      return concat([
        header(DatagramType[frame.type], frame.messageId),
        field(frame.displayName),
        field(frame.content),
      ]);
    case "bye":
      assertField("displayName", frame.displayName);
      return concat([header(DatagramType.bye, frame.messageId), field(frame.displayName)]);
  }
}

function header(typeByte: number, messageId: number): Uint8Array {
  const bytes = new Uint8Array(HEADER_LENGTH);
  bytes[0] = typeByte;
  writeId(bytes, 1, messageId);
  return bytes;
}

function writeId(bytes: Uint8Array, offset: number, id: number): void {
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).setUint16(offset, id & 0xffff);
}

function field(text: string): Uint8Array {
  const body = encoder.encode(text);
  const out = new Uint8Array(body.length + 1);
  out.set(body);
  return out;
}

function concat(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

// ── Decoding ────────────────────────────────────────────────────────

/** Type and identifier of any frame long enough to carry a header. */
export function peekHeader(bytes: Uint8Array): DatagramHeader | null {
  if (bytes.length < HEADER_LENGTH) return null;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return { typeByte: view.getUint8(0), messageId: view.getUint16(1) };
}

/**
 * Read `count` zero-terminated fields starting at `offset`. Fails when a
 * terminator is missing or bytes remain after the last field.
 */
function readFields(bytes: Uint8Array, offset: number, count: number): string[] | string {
  const fields: string[] = [];
  let start = offset;
  for (let i = 0; i < count; i++) {
    const end = bytes.indexOf(0, start);
    if (end < 0) return "unterminated field";
    fields.push(decoder.decode(bytes.subarray(start, end)));
    start = end + 1;
  }
  if (start !== bytes.length) return "trailing bytes after last field";
  return fields;
}

/** Parse a received datagram. Never reads past the end of `bytes`. */
export function decodeDatagram(bytes: Uint8Array): DecodeResult {
  const head = peekHeader(bytes);
  if (!head) return { ok: false, reason: `frame of ${bytes.length} bytes is shorter than its header` };

  const fail = (reason: string): DecodeResult => ({ ok: false, reason, header: head });
  const { typeByte, messageId } = head;

  switch (typeByte) {
    case DatagramType.confirm:
    case DatagramType.ping: {
      if (bytes.length !== HEADER_LENGTH) return fail("trailing bytes after header");
      const type = typeByte === DatagramType.confirm ? "confirm" : "ping";
      return { ok: true, frame: { type, messageId } };
    }
    case DatagramType.reply: {
      // result, reference id, and at least the content terminator
      if (bytes.length < HEADER_LENGTH + 4) return fail("reply frame too short");
      const result = bytes[HEADER_LENGTH];
      if (result !== 0 && result !== 1) return fail(`invalid reply result ${String(result)}`);
      const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
      const refMessageId = view.getUint16(HEADER_LENGTH + 1);
      const fields = readFields(bytes, HEADER_LENGTH + 3, 1);
      if (typeof fields === "string") return fail(fields);
      const [content = ""] = fields;
      return { ok: true, frame: { type: "reply", messageId, success: result === 1, refMessageId, content } };
    }
    case DatagramType.auth: {
      const fields = readFields(bytes, HEADER_LENGTH, 3);
      if (typeof fields === "string") return fail(fields);
      const [username = "", displayName = "", secret = ""] = fields;
      return { ok: true, frame: { type: "auth", messageId, username, displayName, secret } };
    }
    case DatagramType.join: {
      const fields = readFields(bytes, HEADER_LENGTH, 2);
      if (typeof fields === "string") return fail(fields);
      const [channel = "", displayName = ""] = fields;
      return { ok: true, frame: { type: "join", messageId, channel, displayName } };
    }
    case DatagramType.msg:
    case DatagramType.err: {
      const fields = readFields(bytes, HEADER_LENGTH, 2);
      if (typeof fields === "string") return fail(fields);
      const [displayName = "", content = ""] = fields;
      const type = typeByte === DatagramType.msg ? "msg" : "err";
      return { ok: true, frame: { type, messageId, displayName, content } };
    }
    case DatagramType.bye: {
      const fields = readFields(bytes, HEADER_LENGTH, 1);
      if (typeof fields === "string") return fail(fields);
      const [displayName = ""] = fields;
      return { ok: true, frame: { type: "bye", messageId, displayName } };
    }
    default:
      return fail(`unknown frame type ${datagramTypeName(typeByte)}`);
  }
}
