/**
 * The session's view of a transport: typed sends, one stream of inbound
 * events, and the few hooks that differ between wire formats.
 */

import { EventChannel } from "../channel.js";
import type { TransportKind } from "../config.js";
import type { ChatError } from "../errors.js";
import type { Logger } from "../log.js";
import type { InboundEvent, OutboundFrame, SendOptions, SendReport } from "../protocol.js";

export interface ProtocolTransport {
  readonly kind: TransportKind;

  sendAuthenticate(username: string, displayName: string, secret: string, opts?: SendOptions): Promise<SendReport>;
  sendJoin(channel: string, displayName: string, opts?: SendOptions): Promise<SendReport>;
  sendChatMessage(displayName: string, content: string, opts?: SendOptions): Promise<SendReport>;
  sendFarewell(displayName: string, opts?: SendOptions): Promise<SendReport>;
  sendError(displayName: string, content: string, opts?: SendOptions): Promise<SendReport>;

  /**
   * Inbound events in arrival order. Ends after a fault or a disconnect,
   * or when `signal` aborts. Single consumer.
   */
  inbound(signal?: AbortSignal): AsyncIterable<InboundEvent>;

  /**
   * Whether a request is waiting for its reply. Affects duplicate filtering;
   * the first reply admitted clears it.
   */
  expectReply(expecting: boolean): void;

  /** The server accepted the client; stop following its source address. */
  markAuthenticated(): void;

  /** Wait until every outbound frame is settled. False if aborted first. */
  flush(signal?: AbortSignal): Promise<boolean>;

  /** Release the link. Idempotent. */
  disconnect(): Promise<void>;
}

/** Shared plumbing: typed sends map onto one frame sender. */
export abstract class BaseTransport implements ProtocolTransport {
  abstract readonly kind: TransportKind;
  protected readonly events = new EventChannel<InboundEvent>();
  protected readonly log: Logger | undefined;
  #faulted = false;

  protected constructor(log?: Logger) {
    this.log = log;
  }

  protected abstract send(frame: OutboundFrame, opts: SendOptions): Promise<SendReport>;

  abstract disconnect(): Promise<void>;

  sendAuthenticate(username: string, displayName: string, secret: string, opts: SendOptions = {}): Promise<SendReport> {
    return this.send({ type: "auth", username, displayName, secret }, opts);
  }

  sendJoin(channel: string, displayName: string, opts: SendOptions = {}): Promise<SendReport> {
    return this.send({ type: "join", channel, displayName }, opts);
  }

  sendChatMessage(displayName: string, content: string, opts: SendOptions = {}): Promise<SendReport> {
    return this.send({ type: "msg", displayName, content }, opts);
  }

  sendFarewell(displayName: string, opts: SendOptions = {}): Promise<SendReport> {
    return this.send({ type: "bye", displayName }, opts);
  }

  sendError(displayName: string, content: string, opts: SendOptions = {}): Promise<SendReport> {
    return this.send({ type: "err", displayName, content }, opts);
  }

  inbound(signal?: AbortSignal): AsyncIterable<InboundEvent> {
    return this.events.iterate(signal);
  }

  expectReply(_expecting: boolean): void {}

  markAuthenticated(): void {}

  flush(_signal?: AbortSignal): Promise<boolean> {
    return Promise.resolve(true);
  }

  /** Surface a connection fault once and end the inbound stream. */
  protected fault(error: ChatError): void {
    if (this.#faulted) return;
    this.#faulted = true;
    this.log?.("fault: %s", error.message);
    this.events.push({ type: "fault", error });
    this.events.close();
  }
}
