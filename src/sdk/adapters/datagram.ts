/**
 * ProtocolTransport over datagrams, using the binary codec and the
 * reliability engine.
 */

import {
  DatagramType,
  datagramTypeName,
  decodeDatagram,
  encodeDatagram,
  peekHeader,
} from "../codec/datagram.js";
import { normalizeDatagram } from "../codec/normalize.js";
import { isMalformed } from "../codec/stream.js";
import { ConnectionError, toError } from "../errors.js";
import { hexDump, type Logger } from "../log.js";
import { formatAddress, type OutboundFrame, type PeerAddress, type SendOptions, type SendReport } from "../protocol.js";
import { ReliabilityEngine } from "../reliability.js";
import type { Datagram, DatagramLink, Disposable } from "../transport/transport.js";
import { BaseTransport } from "./adapter.js";

export interface DatagramTransportOptions {
  /** Where the first frame goes. */
  readonly server: PeerAddress;
  readonly confirmTimeoutMs: number;
  readonly maxRetries: number;
  readonly log?: Logger;
  /** Logger for the reliability engine. */
  readonly reliabilityLog?: Logger;
}

export class DatagramTransport extends BaseTransport {
  readonly kind = "udp" as const;
  readonly #link: DatagramLink;
  readonly #engine: ReliabilityEngine;
  readonly #subs: Disposable[];
  #expectingReply = false;
  #disconnecting = false;

  constructor(link: DatagramLink, opts: DatagramTransportOptions) {
    super(opts.log);
    this.#link = link;
    this.#engine = new ReliabilityEngine({
      confirmTimeoutMs: opts.confirmTimeoutMs,
      maxRetries: opts.maxRetries,
      initialPeer: opts.server,
      transmit: (payload, to) => this.#transmit(payload, to),
      log: opts.reliabilityLog,
    });
    this.#subs = [
      link.onMessage((datagram) => this.#handleDatagram(datagram)),
      link.onError((err) => this.log?.("socket error: %s", err.message)),
      link.onClose(() => {
        if (!this.#disconnecting) this.fault(new ConnectionError("Socket closed"));
        this.events.close();
      }),
    ];
  }

  /** Current destination of outbound frames. */
  get peer(): PeerAddress {
    return this.#engine.peer;
  }

  protected send(frame: OutboundFrame, opts: SendOptions): Promise<SendReport> {
    const messageId = this.#engine.nextMessageId();
    const bytes = encodeDatagram({ ...frame, messageId });
    return this.#engine.deliver(messageId, bytes, opts.signal);
  }

  override expectReply(expecting: boolean): void {
    this.#expectingReply = expecting;
  }

  override markAuthenticated(): void {
    this.#engine.lockPeer();
    this.log?.("peer locked at %s", formatAddress(this.#engine.peer));
  }

  override flush(signal?: AbortSignal): Promise<boolean> {
    return this.#engine.waitForIdle(signal);
  }

  async disconnect(): Promise<void> {
    this.#disconnecting = true;
    await this.#link.close();
    for (const sub of this.#subs) sub.dispose();
    this.events.close();
  }

  #transmit(payload: Uint8Array, to: PeerAddress): Promise<void> {
    this.log?.("send %s -> %s [%s]", datagramTypeName(payload[0] ?? -1), formatAddress(to), hexDump(payload));
    return this.#link.send(payload, to);
  }

  #handleDatagram({ data, from }: Datagram): void {
    const head = peekHeader(data);
    this.log?.(
      "recv %s <- %s [%s]",
      head ? datagramTypeName(head.typeByte) : "runt",
      formatAddress(from),
      hexDump(data),
    );

    this.#engine.observeSource(from);

    if (head?.typeByte === DatagramType.confirm) {
      const decoded = decodeDatagram(data);
      if (decoded.ok) this.#engine.acknowledge(head.messageId);
      else this.events.push({ type: "malformed", reason: decoded.reason });
      return;
    }

    if (head) this.#confirm(head.messageId, from);

    const decoded = decodeDatagram(data);
    if (!decoded.ok) {
      this.events.push({ type: "malformed", reason: decoded.reason });
      return;
    }

    const { frame } = decoded;
    if (frame.type === "ping") return;

    const reply = frame.type === "reply";
    if (!this.#engine.admit(frame.messageId, { reply, expectingReply: this.#expectingReply })) {
      this.log?.("duplicate id=%d dropped", frame.messageId);
      return;
    }
    // One reply settles the request; copies queued behind it are duplicates
    if (reply) this.#expectingReply = false;

    const message = normalizeDatagram(frame);
    if (isMalformed(message)) {
      this.events.push({ type: "malformed", reason: message.reason });
    } else {
      this.events.push({ type: "message", message });
    }
  }

  #confirm(messageId: number, to: PeerAddress): void {
    this.#transmit(encodeDatagram({ type: "confirm", messageId }), to).catch((err: unknown) => {
      this.log?.("confirm id=%d failed: %s", messageId, toError(err).message);
    });
  }
}
