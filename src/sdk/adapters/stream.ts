/**
 * ProtocolTransport over a byte stream, using the CRLF text codec.
 */

import { encodeStreamFrame, isMalformed, LineFramer, decodeStreamLine } from "../codec/stream.js";
import { ConnectionError } from "../errors.js";
import type { Logger } from "../log.js";
import type { OutboundFrame, SendOptions, SendReport } from "../protocol.js";
import type { Disposable, StreamLink } from "../transport/transport.js";
import { BaseTransport } from "./adapter.js";

export class StreamTransport extends BaseTransport {
  readonly kind = "tcp" as const;
  readonly #link: StreamLink;
  readonly #framer = new LineFramer();
  readonly #subs: Disposable[];
  #disconnecting = false;

  constructor(link: StreamLink, log?: Logger) {
    super(log);
    this.#link = link;
    this.#subs = [
      link.onData((chunk) => {
        for (const line of this.#framer.push(chunk)) {
          if (typeof line === "string") this.#handleLine(line);
          else this.events.push({ type: "malformed", reason: line.reason });
        }
      }),
      link.onError((err) => this.log?.("socket error: %s", err.message)),
      link.onClose((reason) => this.#handleClose(reason)),
    ];
  }

  protected async send(frame: OutboundFrame, _opts: SendOptions): Promise<SendReport> {
    const line = encodeStreamFrame(frame);
    this.log?.("send %s", frame.type === "auth" ? `AUTH ${frame.username} AS ${frame.displayName} USING ***` : line.trimEnd());
    await this.#link.send(line);
    return { messageId: null, confirmed: true, transmissions: 1, aborted: false };
  }

  async disconnect(): Promise<void> {
    this.#disconnecting = true;
    await this.#link.close();
    for (const sub of this.#subs) sub.dispose();
    this.events.close();
  }

  #handleLine(line: string): void {
    this.log?.("recv %s", line);
    const decoded = decodeStreamLine(line);
    if (isMalformed(decoded)) {
      this.events.push({ type: "malformed", reason: decoded.reason });
    } else {
      this.events.push({ type: "message", message: decoded });
    }
  }

  #handleClose(reason?: Error): void {
    if (this.#disconnecting) {
      this.events.close();
      return;
    }
    const message = reason?.message ?? "Connection closed by server";
    this.fault(new ConnectionError(message, reason ? { cause: reason } : undefined));
  }
}
