/**
 * Stream link over a TCP socket.
 */

import net from "node:net";
import { ClientClosedError, ConnectionError, TimeoutError } from "../errors.js";
import type { Logger } from "../log.js";
import { HandlerSet, type Disposable, type LinkState, type StreamLink } from "./transport.js";

/** How long a graceful close may take before the socket is destroyed. */
const CLOSE_GRACE_MS = 500;

export class TcpLink implements StreamLink {
  readonly #socket: net.Socket;
  readonly #log: Logger | undefined;
  readonly #data = new HandlerSet<[string]>();
  readonly #close = new HandlerSet<[Error | undefined]>();
  readonly #error = new HandlerSet<[Error]>();
  readonly #closed: Promise<void>;
  #state: LinkState = "open";
  #lastError: Error | undefined;
  #closing = false;

  constructor(socket: net.Socket, log?: Logger) {
    this.#socket = socket;
    this.#log = log;
    socket.setEncoding("utf8");
    socket.setNoDelay(true);

    socket.on("data", (chunk: string) => {
      this.#log?.("recv %d chars", chunk.length);
      this.#data.fire(chunk);
    });

    socket.on("error", (err: Error) => {
      this.#lastError = err;
      this.#error.fire(err);
    });

    this.#closed = new Promise<void>((resolve) => {
      socket.once("close", () => {
        this.#state = "closed";
        const reason = this.#closing
          ? undefined
          : (this.#lastError ?? new Error("Connection closed by server"));
        this.#log?.("closed%s", reason ? `: ${reason.message}` : "");
        this.#close.fire(reason);
        this.#close.clear();
        resolve();
      });
    });
  }

  get state(): LinkState {
    return this.#state;
  }

  send(data: string): Promise<void> {
    if (this.#state !== "open" || this.#closing) {
      return Promise.reject(new ClientClosedError());
    }
    return new Promise<void>((resolve, reject) => {
      this.#socket.write(data, "utf8", (err) => {
        if (err) reject(new ConnectionError(`Send failed: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
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
    if (!this.#closing) {
      this.#closing = true;
      this.#socket.end();
      const timer = setTimeout(() => this.#socket.destroy(), CLOSE_GRACE_MS);
      void this.#closed.then(() => clearTimeout(timer));
    }
    return this.#closed;
  }
}

export interface ConnectTcpOptions {
  readonly timeoutMs: number;
  readonly log?: Logger;
}

/** Open a TCP connection, failing after `timeoutMs`. */
export function connectTcp(host: string, port: number, opts: ConnectTcpOptions): Promise<TcpLink> {
  return new Promise<TcpLink>((resolve, reject) => {
    const socket = net.createConnection({ host, port });

    const timer = setTimeout(() => {
      socket.off("error", onError);
      socket.destroy();
      reject(new TimeoutError(`connect ${host}:${port}`, opts.timeoutMs));
    }, opts.timeoutMs);

    const onError = (err: Error): void => {
      clearTimeout(timer);
      reject(new ConnectionError(`Could not connect to ${host}:${port}: ${err.message}`, { cause: err }));
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.off("error", onError);
      opts.log?.("connected to %s:%d from %s:%d", host, port, socket.localAddress, socket.localPort);
      resolve(new TcpLink(socket, opts.log));
    });
  });
}
