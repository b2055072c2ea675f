/**
 * Delivery guarantees for the datagram transport.
 *
 * Tracks outbound frames until the peer confirms them, retransmits the
 * identical bytes on timeout, filters inbound duplicates and follows the
 * server to the address it answers from until authentication pins it.
 */

import type { Logger } from "./log.js";
import { formatAddress, sameAddress, type PeerAddress, type SendReport } from "./protocol.js";

/** Sends bytes to an address. Rejects when the link cannot send. */
export type Transmit = (payload: Uint8Array, to: PeerAddress) => Promise<void>;

export interface ReliabilityOptions {
  readonly confirmTimeoutMs: number;
  readonly maxRetries: number;
  /** Where frames go until the server answers from elsewhere. */
  readonly initialPeer: PeerAddress;
  readonly transmit: Transmit;
  readonly log?: Logger;
}

/** Outcome of one acknowledgment wait. */
type AckWait = "acked" | "timeout" | "aborted";

interface PendingAck {
  readonly messageId: number;
  acked: boolean;
  wake: (() => void) | null;
}

export interface AdmitOptions {
  /** The frame is a reply. */
  readonly reply: boolean;
  /** A request is waiting for its reply. */
  readonly expectingReply: boolean;
}

const ID_SPACE = 0x10000;

export class ReliabilityEngine {
  readonly #confirmTimeoutMs: number;
  readonly #maxRetries: number;
  readonly #transmit: Transmit;
  readonly #log: Logger | undefined;
  readonly #pending = new Map<number, PendingAck>();
  readonly #seen = new Set<number>();
  readonly #idleWaiters = new Set<() => void>();
  #peer: PeerAddress;
  #locked = false;
  #nextId = 0;

  constructor(opts: ReliabilityOptions) {
    this.#confirmTimeoutMs = opts.confirmTimeoutMs;
    this.#maxRetries = opts.maxRetries;
    this.#transmit = opts.transmit;
    this.#log = opts.log;
    this.#peer = opts.initialPeer;
  }

  // ── Outbound ──────────────────────────────────────────────────────

  /** Identifier for the next outbound frame. Starts at 0 and wraps at 65536. */
  nextMessageId(): number {
    const id = this.#nextId;
    this.#nextId = (this.#nextId + 1) % ID_SPACE;
    return id;
  }

  /** Number of frames still waiting for an acknowledgment. */
  get pendingCount(): number {
    return this.#pending.size;
  }

  /**
   * Send `payload` and wait for its acknowledgment, retransmitting the same
   * bytes up to `maxRetries` times. When the budget runs out the frame goes
   * out once more without waiting and the report says `confirmed: false`.
   */
  async deliver(messageId: number, payload: Uint8Array, signal?: AbortSignal): Promise<SendReport> {
    const entry: PendingAck = { messageId, acked: false, wake: null };
    this.#pending.set(messageId, entry);
    let transmissions = 0;
    const report = (confirmed: boolean, aborted: boolean): SendReport => ({
      messageId,
      confirmed,
      transmissions,
      aborted,
    });

    try {
      await this.#transmit(payload, this.#peer);
      transmissions++;

      for (let attempt = 0; ; attempt++) {
        const outcome = await this.#waitForAck(entry, signal);
        if (outcome === "acked") return report(true, false);
        if (outcome === "aborted") return report(false, true);
        if (attempt >= this.#maxRetries) break;

        this.#log?.("retransmit id=%d (%d/%d)", messageId, attempt + 1, this.#maxRetries);
        await this.#transmit(payload, this.#peer);
        transmissions++;
      }

      await this.#transmit(payload, this.#peer);
      transmissions++;
      this.#log?.("id=%d unconfirmed after %d transmissions, continuing degraded", messageId, transmissions);
      return report(false, false);
    } finally {
      if (this.#pending.get(messageId) === entry) this.#pending.delete(messageId);
      if (this.#pending.size === 0) this.#notifyIdle();
    }
  }

  /** Settle the pending frame with this identifier. False when none matches. */
  acknowledge(messageId: number): boolean {
    const entry = this.#pending.get(messageId);
    if (!entry) return false;
    entry.acked = true;
    entry.wake?.();
    return true;
  }

  /** Resolves true once nothing awaits acknowledgment, false if aborted first. */
  waitForIdle(signal?: AbortSignal): Promise<boolean> {
    if (this.#pending.size === 0) return Promise.resolve(true);
    if (signal?.aborted) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const onIdle = (): void => {
        signal?.removeEventListener("abort", onAbort);
        resolve(true);
      };
      const onAbort = (): void => {
        this.#idleWaiters.delete(onIdle);
        resolve(false);
      };
      this.#idleWaiters.add(onIdle);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  #waitForAck(entry: PendingAck, signal?: AbortSignal): Promise<AckWait> {
    if (entry.acked) return Promise.resolve("acked");
    if (signal?.aborted) return Promise.resolve("aborted");

    return new Promise<AckWait>((resolve) => {
      const finish = (outcome: AckWait): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        entry.wake = null;
        resolve(outcome);
      };
      const onAbort = (): void => finish("aborted");
      const timer = setTimeout(() => finish(entry.acked ? "acked" : "timeout"), this.#confirmTimeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });
      entry.wake = () => finish("acked");
    });
  }

  #notifyIdle(): void {
    const waiters = [...this.#idleWaiters];
    this.#idleWaiters.clear();
    for (const wake of waiters) wake();
  }

  // ── Inbound ───────────────────────────────────────────────────────

  /**
   * Whether an inbound frame should be processed. Each identifier is
   * processed once, except that a repeated reply still counts while a
   * request is waiting for one.
   */
  admit(messageId: number, opts: AdmitOptions): boolean {
    if (!this.#seen.has(messageId)) {
      this.#seen.add(messageId);
      return true;
    }
    return opts.reply && opts.expectingReply;
  }

  // ── Addressing ────────────────────────────────────────────────────

  /** Current destination of outbound frames. */
  get peer(): PeerAddress {
    return this.#peer;
  }

  /** Whether the destination is pinned. */
  get locked(): boolean {
    return this.#locked;
  }

  /**
   * Follow the server to the address a frame came from. Returns true when
   * the destination changed. No-op once locked.
   */
  observeSource(source: PeerAddress): boolean {
    if (this.#locked || sameAddress(source, this.#peer)) return false;
    this.#log?.("peer moved %s -> %s", formatAddress(this.#peer), formatAddress(source));
    this.#peer = source;
    return true;
  }

  /** Pin the current destination. */
  lockPeer(): void {
    this.#locked = true;
  }
}
