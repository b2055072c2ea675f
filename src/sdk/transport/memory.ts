/**
 * In-memory links for deterministic testing.
 *
 * Data sent on one side appears on the other via queueMicrotask, giving
 * async-like ordering without real I/O. The datagram network can drop
 * chosen packets to exercise retransmission.
 */

import { ClientClosedError } from "../errors.js";
import { formatAddress, type PeerAddress } from "../protocol.js";
import {
  HandlerSet,
  type Datagram,
  type DatagramLink,
  type Disposable,
  type LinkState,
  type StreamLink,
} from "./transport.js";

// ── Stream ──────────────────────────────────────────────────────────

/**
 * Create a linked pair of in-memory stream links. Closing either side
 * closes both: the closing side sees a clean close, the other side sees
 * the close as an end of stream with no reason.
 */
export function createMemoryStreamPair(): [MemoryStreamLink, MemoryStreamLink] {
  const a = new MemoryStreamLink();
  const b = new MemoryStreamLink();
  a.peer = b;
  b.peer = a;
  return [a, b];
}

/** One end of an in-memory stream pair. */
export class MemoryStreamLink implements StreamLink {
  readonly #data = new HandlerSet<[string]>();
  readonly #close = new HandlerSet<[Error | undefined]>();
  readonly #error = new HandlerSet<[Error]>();
  #state: LinkState = "open";
  peer: MemoryStreamLink | null = null;

  get state(): LinkState {
    return this.#state;
  }

  send(data: string): Promise<void> {
    if (this.#state !== "open") return Promise.reject(new ClientClosedError());
    const target = this.peer;
    queueMicrotask(() => {
      if (!target || target.#state !== "open") return;
      target.#data.fire(data);
    });
    return Promise.resolve();
  }

  onData(handler: (chunk: string) => void): Disposable {
    return this.#data.add(handler);
  }

  onClose(handler: (reason?: Error) => void): Disposable {
    return this.#close.add(handler);
  }

  onError(handler: (error: Error) => void): Disposable {
    return this.#error.add(handler);
  }

  close(): Promise<void> {
    if (this.#state === "closed") return Promise.resolve();
    this.#shut();
    const peer = this.peer;
    // Deliver after data already in flight
    queueMicrotask(() => {
      if (peer) peer.#shut();
    });
    return Promise.resolve();
  }

  /** Fail the link with an error, as a reset socket would. */
  fail(reason: Error): void {
    if (this.#state === "closed") return;
    this.#error.fire(reason);
    this.#shut(reason);
  }

  #shut(reason?: Error): void {
    if (this.#state === "closed") return;
    this.#state = "closed";
    this.#close.fire(reason);
    this.#close.clear();
  }
}

// ── Datagram ────────────────────────────────────────────────────────

/** A datagram in flight between two memory links. */
export interface Packet {
  readonly data: Uint8Array;
  readonly from: PeerAddress;
  readonly to: PeerAddress;
}

export interface MemoryDatagramNetworkOptions {
  /** Return true to lose the packet. Called once per send, in send order. */
  drop?: (packet: Packet) => boolean;
}

/**
 * A tiny network of datagram links, addressed like UDP sockets. Every send
 * is recorded in {@link sent}; packets the `drop` predicate rejects are
 * recorded in {@link dropped} and never delivered.
 */
export class MemoryDatagramNetwork {
  readonly #sides = new Map<string, MemoryDatagramSide>();
  readonly #drop: ((packet: Packet) => boolean) | undefined;
  readonly sent: Packet[] = [];
  readonly dropped: Packet[] = [];

  constructor(opts: MemoryDatagramNetworkOptions = {}) {
    this.#drop = opts.drop;
  }

  /** Create a link reachable at `address`. */
  bind(address: PeerAddress): DatagramLink {
    const key = formatAddress(address);
    if (this.#sides.has(key)) throw new Error(`Address ${key} already bound`);
    const side = new MemoryDatagramSide(address, (packet) => this.#route(packet), () => {
      this.#sides.delete(key);
    });
    this.#sides.set(key, side);
    return side;
  }

  /** Packets sent from one address to another, in send order. */
  between(from: PeerAddress, to: PeerAddress): Packet[] {
    const fromKey = formatAddress(from);
    const toKey = formatAddress(to);
    return this.sent.filter((p) => formatAddress(p.from) === fromKey && formatAddress(p.to) === toKey);
  }

  #route(packet: Packet): void {
    this.sent.push(packet);
    if (this.#drop?.(packet)) {
      this.dropped.push(packet);
      return;
    }
    const target = this.#sides.get(formatAddress(packet.to));
    queueMicrotask(() => target?.receive({ data: packet.data, from: packet.from }));
  }
}

class MemoryDatagramSide implements DatagramLink {
  readonly #address: PeerAddress;
  readonly #route: (packet: Packet) => void;
  readonly #unbind: () => void;
  readonly #message = new HandlerSet<[Datagram]>();
  readonly #close = new HandlerSet<[Error | undefined]>();
  readonly #error = new HandlerSet<[Error]>();
  #state: LinkState = "open";

  constructor(address: PeerAddress, route: (packet: Packet) => void, unbind: () => void) {
    this.#address = address;
    this.#route = route;
    this.#unbind = unbind;
  }

  get state(): LinkState {
    return this.#state;
  }

  send(data: Uint8Array, to: PeerAddress): Promise<void> {
    if (this.#state !== "open") return Promise.reject(new ClientClosedError());
    this.#route({ data: Uint8Array.from(data), from: this.#address, to });
    return Promise.resolve();
  }

  receive(datagram: Datagram): void {
    if (this.#state !== "open") return;
    this.#message.fire(datagram);
  }

  onMessage(handler: (datagram: Datagram) => void): Disposable {
    return this.#message.add(handler);
  }

  onClose(handler: (reason?: Error) => void): Disposable {
    return this.#close.add(handler);
  }

  onError(handler: (error: Error) => void): Disposable {
    return this.#error.add(handler);
  }

  close(): Promise<void> {
    if (this.#state === "open") {
      this.#state = "closed";
      this.#unbind();
      this.#close.fire(undefined);
      this.#close.clear();
    }
    return Promise.resolve();
  }
}

export interface MemoryDatagramPair {
  readonly network: MemoryDatagramNetwork;
  readonly client: DatagramLink;
  readonly server: DatagramLink;
  readonly clientAddress: PeerAddress;
  readonly serverAddress: PeerAddress;
}

/** A client link and a server link on a fresh network. */
export function createMemoryDatagramPair(opts: MemoryDatagramNetworkOptions = {}): MemoryDatagramPair {
  const network = new MemoryDatagramNetwork(opts);
  const clientAddress: PeerAddress = { address: "127.0.0.1", port: 50000 };
  const serverAddress: PeerAddress = { address: "127.0.0.1", port: 4567 };
  return {
    network,
    client: network.bind(clientAddress),
    server: network.bind(serverAddress),
    clientAddress,
    serverAddress,
  };
}
