/**
 * Datagram link over a UDP socket.
 */

import dgram from "node:dgram";
import { lookup } from "node:dns/promises";
import { ClientClosedError, ConnectionError, toError } from "../errors.js";
import type { Logger } from "../log.js";
import type { PeerAddress } from "../protocol.js";
import { HandlerSet, type Datagram, type DatagramLink, type Disposable, type LinkState } from "./transport.js";

export class UdpLink implements DatagramLink {
  readonly #socket: dgram.Socket;
  readonly #message = new HandlerSet<[Datagram]>();
  readonly #close = new HandlerSet<[Error | undefined]>();
  readonly #error = new HandlerSet<[Error]>();
  readonly #closed: Promise<void>;
  #state: LinkState = "open";

  constructor(socket: dgram.Socket) {
    this.#socket = socket;

    socket.on("message", (msg: Buffer, rinfo: dgram.RemoteInfo) => {
      this.#message.fire({ data: msg, from: { address: rinfo.address, port: rinfo.port } });
    });

    socket.on("error", (err: Error) => this.#error.fire(err));

    this.#closed = new Promise<void>((resolve) => {
      socket.once("close", () => {
        this.#state = "closed";
        this.#close.fire(undefined);
        this.#close.clear();
        resolve();
      });
    });
  }

  get state(): LinkState {
    return this.#state;
  }

  /** Local port the socket is bound to. */
  get localPort(): number {
    return this.#socket.address().port;
  }

  send(data: Uint8Array, to: PeerAddress): Promise<void> {
    if (this.#state !== "open") return Promise.reject(new ClientClosedError());
    return new Promise<void>((resolve, reject) => {
      this.#socket.send(data, to.port, to.address, (err) => {
        if (err) reject(new ConnectionError(`Send failed: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
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
      this.#socket.close();
    }
    return this.#closed;
  }
}

export interface OpenUdpResult {
  readonly link: UdpLink;
  /** Resolved server address. */
  readonly server: PeerAddress;
}

/** Resolve the server and bind a socket of the matching family to an ephemeral port. */
export async function openUdp(host: string, port: number, log?: Logger): Promise<OpenUdpResult> {
  let resolved: { address: string; family: number };
  try {
    resolved = await lookup(host);
  } catch (err) {
    throw new ConnectionError(`Could not resolve ${host}: ${toError(err).message}`, { cause: toError(err) });
  }

  const socket = dgram.createSocket(resolved.family === 6 ? "udp6" : "udp4");
  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(new ConnectionError(`Could not bind UDP socket: ${err.message}`, { cause: err }));
    };
    socket.once("error", onError);
    socket.bind(0, () => {
      socket.off("error", onError);
      resolve();
    });
  });

  const link = new UdpLink(socket);
  log?.("bound udp port %d, server %s:%d", link.localPort, resolved.address, port);
  return { link, server: { address: resolved.address, port } };
}
