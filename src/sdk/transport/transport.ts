import type { PeerAddress } from "../protocol.js";

/** Lifecycle state of a link. */
export type LinkState = "connecting" | "open" | "closed";

/** Callback cleanup handle. */
export interface Disposable {
  dispose(): void;
}

/**
 * Ordered byte stream to the server, carried as text.
 *
 * Implementations deliver chunks exactly as they arrive; framing is the
 * adapter's job.
 */
export interface StreamLink {
  /** Current connection state. */
  readonly state: LinkState;

  /** Write text. Rejects if the link is not open or the write fails. */
  send(data: string): Promise<void>;

  /** Register a handler for received chunks. Returns cleanup handle. */
  onData(handler: (chunk: string) => void): Disposable;

  /** Register a handler for link close. Fires once; no reason on a clean close. */
  onClose(handler: (reason?: Error) => void): Disposable;

  /** Register a handler for socket errors. */
  onError(handler: (error: Error) => void): Disposable;

  /** Finish writing and release the connection. Idempotent. */
  close(): Promise<void>;
}

/** One received datagram. */
export interface Datagram {
  readonly data: Uint8Array;
  readonly from: PeerAddress;
}

/** Unreliable, unordered message link. */
export interface DatagramLink {
  readonly state: LinkState;

  /** Send one datagram. Rejects if the link is closed or the send fails. */
  send(data: Uint8Array, to: PeerAddress): Promise<void>;

  onMessage(handler: (datagram: Datagram) => void): Disposable;

  onClose(handler: (reason?: Error) => void): Disposable;

  onError(handler: (error: Error) => void): Disposable;

  /** Release the socket. Idempotent. */
  close(): Promise<void>;
}

/** Handler registry shared by the link implementations. */
export class HandlerSet<A extends unknown[]> {
  readonly #handlers = new Set<(...args: A) => void>();

  add(handler: (...args: A) => void): Disposable {
    this.#handlers.add(handler);
    return { dispose: () => this.#handlers.delete(handler) };
  }

  fire(...args: A): void {
    for (const handler of [...this.#handlers]) handler(...args);
  }

  clear(): void {
    this.#handlers.clear();
  }
}
