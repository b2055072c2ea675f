/**
 * ChatSession: the client side of one chat connection.
 *
 * Owns the protocol state machine, the receive loop and teardown. Commands
 * are validated locally first; a rejected command never touches the
 * network. Every state mutation (commands and inbound events alike) runs
 * under one lock.
 *
 * @example
 * ```ts
 * const session = await connectSession(resolveConfig({ transport: "tcp", host: "localhost" }));
 *
 * const outcome = await session.authenticate("alice", "Alice", "test-secret");
 * if (outcome.status === "success") await session.sendMessage("hi all");
 *
 * for await (const effect of session.effects()) {
 *   if (effect.type === "chat") console.log(`${effect.sender}: ${effect.content}`);
 * }
 * ```
 */

import { Mutex } from "async-mutex";
import type { ProtocolTransport } from "./adapters/adapter.js";
import { EventChannel } from "./channel.js";
import type { ReplyOutcome, SessionEffect } from "./effects.js";
import { InvalidStateError, toError } from "./errors.js";
import { assertField, toPrintable } from "./fields.js";
import type { Logger } from "./log.js";
import type { InboundEvent, NormalizedMessage, SendReport } from "./protocol.js";
import { ShutdownCoordinator, type ShutdownBudgets, type ShutdownPlan, type ShutdownReport } from "./shutdown.js";
import { commandRejection } from "../state/session.js";
import { createSessionStore, type SessionStore } from "../state/store.js";
import type { PendingRequest, SessionCommand, SessionSnapshot, TerminationReason } from "../state/types.js";

// ── Options ──────────────────────────────────────────────────────────

export interface ChatSessionOptions {
  readonly transport: ProtocolTransport;
  /** How long authenticate and join wait for their reply. */
  readonly replyTimeoutMs: number;
  readonly log?: Logger;
  readonly shutdownLog?: Logger;
  readonly shutdownBudgets?: ShutdownBudgets;
}

/** Display name used on an error frame sent before the user picked one. */
const FALLBACK_DISPLAY_NAME = "client";

interface ReplyWaiter {
  readonly request: PendingRequest;
  readonly resolve: (outcome: ReplyOutcome) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

// ── Session ──────────────────────────────────────────────────────────

export class ChatSession {
  readonly #transport: ProtocolTransport;
  readonly #replyTimeoutMs: number;
  readonly #log: Logger | undefined;
  readonly #store: SessionStore = createSessionStore();
  readonly #mutex = new Mutex();
  readonly #effects = new EventChannel<SessionEffect>();
  readonly #commandAbort = new AbortController();
  readonly #receiveAbort = new AbortController();
  readonly #shutdown: ShutdownCoordinator;
  readonly #receiving: Promise<void>;
  #pendingReply: ReplyWaiter | null = null;
  #faultReason: string | null = null;

  constructor(opts: ChatSessionOptions) {
    this.#transport = opts.transport;
    this.#replyTimeoutMs = opts.replyTimeoutMs;
    this.#log = opts.log;
    this.#shutdown = new ShutdownCoordinator({
      transport: opts.transport,
      abortActivity: () => {
        this.#commandAbort.abort();
        this.#receiveAbort.abort();
      },
      budgets: opts.shutdownBudgets,
      log: opts.shutdownLog,
    });
    this.#receiving = this.#receiveLoop();
  }

  /** Current protocol state. */
  get state(): SessionSnapshot {
    return this.#store.getState();
  }

  /** The backing store, for subscribers. */
  get store(): SessionStore {
    return this.#store;
  }

  /** Which wire format the session speaks. */
  get transportKind(): ProtocolTransport["kind"] {
    return this.#transport.kind;
  }

  /**
   * Effects in the order they happened. Ends once shutdown completes.
   * Single consumer.
   */
  effects(signal?: AbortSignal): AsyncIterable<SessionEffect> {
    return this.#effects.iterate(signal);
  }

  // ── Commands ─────────────────────────────────────────────────────────

  /** Ask the server to accept the client. Resolves with the reply, or why none came. */
  async authenticate(username: string, displayName: string, secret: string): Promise<ReplyOutcome> {
    return this.#request("authenticate", () => {
      assertField("username", username);
      assertField("secret", secret);
      assertField("displayName", displayName);
      this.#store.getState().beginAuthentication(displayName);
      return (signal) => this.#transport.sendAuthenticate(username, displayName, secret, { signal });
    });
  }

  /** Move to another channel. */
  async join(channel: string): Promise<ReplyOutcome> {
    return this.#request("join", () => {
      assertField("channel", channel);
      const displayName = this.#displayName();
      this.#store.getState().beginJoin(channel);
      return (signal) => this.#transport.sendJoin(channel, displayName, { signal });
    });
  }

  /** Send a chat line to the current channel. */
  async sendMessage(content: string): Promise<SendReport> {
    return this.#mutex.runExclusive(async () => {
      this.#assertAllowed("message");
      assertField("content", content);
      const report = await this.#transport.sendChatMessage(this.#displayName(), content, {
        signal: this.#commandAbort.signal,
      });
      this.#logReport("message", report);
      return report;
    });
  }

  /** Change the display name used on later frames. Local only. */
  async rename(displayName: string): Promise<void> {
    await this.#mutex.runExclusive(() => {
      this.#assertAllowed("rename");
      assertField("displayName", displayName);
      this.#store.getState().rename(displayName);
      this.#log?.("display name is now %s", displayName);
    });
  }

  /**
   * End the session. The first call decides the reason; later calls join
   * the shutdown already under way.
   */
  leave(reason: TerminationReason = "user"): Promise<ShutdownReport> {
    this.#terminate(reason);
    return this.#shutdown.run(() => this.#shutdownPlan()).then(async (report) => {
      await this.#receiving;
      this.#effects.close();
      return report;
    });
  }

  // ── Requests ─────────────────────────────────────────────────────────

  /**
   * Validate and send a request under the lock, then wait for its reply
   * outside it. `prepare` runs after the state check; it validates,
   * applies the transition and returns the send.
   */
  async #request(
    command: Extract<SessionCommand, "authenticate" | "join">,
    prepare: () => (signal: AbortSignal) => Promise<SendReport>,
  ): Promise<ReplyOutcome> {
    const { outcome } = await this.#mutex.runExclusive(async () => {
      this.#assertAllowed(command);
      const send = prepare();
      const request = this.#store.getState().pendingRequest;
      if (request === null) throw new InvalidStateError(this.state.phase, "No request to send");

      const outcome = new Promise<ReplyOutcome>((resolve) => {
        this.#pendingReply = { request, resolve, timer: null };
      });
      this.#transport.expectReply(true);

      let report: SendReport;
      try {
        report = await send(this.#commandAbort.signal);
      } catch (err) {
        this.#abandonRequest();
        throw err;
      }
      this.#logReport(request, report);

      const waiter = this.#pendingReply;
      if (waiter?.request === request) {
        waiter.timer = setTimeout(() => this.#onReplyTimeout(waiter), this.#replyTimeoutMs);
      }
      return { outcome };
    });
    return outcome;
  }

  #onReplyTimeout(waiter: ReplyWaiter): void {
    this.#mutex
      .runExclusive(() => {
        if (this.#pendingReply !== waiter) return;
        this.#log?.("%s: no reply after %dms", waiter.request, this.#replyTimeoutMs);
        this.#abandonRequest({ status: "timeout", content: "" });
        this.#effects.push({ type: "replyTimeout", request: waiter.request });
      })
      .catch((err: unknown) => this.#log?.("reply timeout handling failed: %s", toError(err).message));
  }

  /** Forget the outstanding request and revert its state. */
  #abandonRequest(outcome: ReplyOutcome = { status: "aborted", content: "" }): void {
    this.#settleReply(outcome);
    this.#store.getState().expireRequest();
    this.#transport.expectReply(false);
  }

  #settleReply(outcome: ReplyOutcome): void {
    const waiter = this.#pendingReply;
    if (!waiter) return;
    this.#pendingReply = null;
    if (waiter.timer) clearTimeout(waiter.timer);
    waiter.resolve(outcome);
  }

  // ── Inbound ──────────────────────────────────────────────────────────

  async #receiveLoop(): Promise<void> {
    try {
      for await (const event of this.#transport.inbound(this.#receiveAbort.signal)) {
        await this.#mutex.runExclusive(() => this.#handleInbound(event));
        if (this.state.phase === "terminated") break;
      }
    } catch (err) {
      this.#log?.("receive loop failed: %s", toError(err).message);
    }
  }

  #handleInbound(event: InboundEvent): void {
    if (this.state.phase === "terminated") return;

    switch (event.type) {
      case "fault":
        this.#effects.push({ type: "connectionLost", message: event.error.message });
        this.#end("connection-lost");
        return;
      case "malformed":
        this.#protocolFault(event.reason);
        return;
      case "message":
        this.#handleMessage(event.message);
        return;
    }
  }

  #handleMessage(message: NormalizedMessage): void {
    switch (message.kind) {
      case "reply": {
        const resolution = this.#store.getState().resolveReply(message.success);
        if (!resolution) {
          this.#protocolFault("Unexpected REPLY with no request outstanding");
          return;
        }
        this.#transport.expectReply(false);
        if (resolution.request === "authentication" && resolution.success) {
          this.#transport.markAuthenticated();
        }
        this.#log?.("%s %s", resolution.request, resolution.success ? "accepted" : "refused");
        this.#effects.push({
          type: "reply",
          request: resolution.request,
          success: resolution.success,
          content: message.content,
        });
        this.#settleReply({ status: resolution.success ? "success" : "failure", content: message.content });
        return;
      }
      case "chat":
        if (!this.state.authenticated) {
          this.#log?.("chat from %s before authentication ignored", message.sender);
          return;
        }
        this.#effects.push({ type: "chat", sender: message.sender, content: message.content });
        return;
      case "error":
        this.#effects.push({ type: "peerError", sender: message.sender, content: message.content });
        this.#end("peer-error");
        return;
      case "farewell":
        this.#effects.push({ type: "peerFarewell", sender: message.sender });
        this.#end("peer-farewell");
        return;
    }
  }

  #protocolFault(reason: string): void {
    this.#log?.("protocol fault: %s", reason);
    this.#faultReason = reason;
    this.#effects.push({ type: "protocolFault", reason });
    this.#end("protocol-fault");
  }

  /** Terminate from inside the lock and start teardown without waiting for it. */
  #end(reason: TerminationReason): void {
    this.leave(reason).catch((err: unknown) => {
      this.#log?.("shutdown failed: %s", toError(err).message);
    });
  }

  // ── Helpers ──────────────────────────────────────────────────────────

  #terminate(reason: TerminationReason): void {
    if (!this.#store.getState().terminate(reason)) return;
    this.#settleReply({ status: "aborted", content: "" });
    this.#effects.push({ type: "terminated", reason });
  }

  #shutdownPlan(): ShutdownPlan {
    const { terminationReason, authenticated, displayName } = this.state;
    const reason = terminationReason ?? "user";
    return {
      reason,
      displayName: displayName ?? FALLBACK_DISPLAY_NAME,
      errorContent: reason === "protocol-fault" ? toPrintable(this.#faultReason ?? "Protocol error") : null,
      farewell: authenticated,
    };
  }

  #assertAllowed(command: SessionCommand): void {
    const rejection = commandRejection(this.state, command);
    if (rejection !== null) throw new InvalidStateError(this.state.phase, rejection);
  }

  #displayName(): string {
    const { displayName, phase } = this.state;
    if (displayName === null) throw new InvalidStateError(phase, "No display name set");
    return displayName;
  }

  #logReport(what: string, report: SendReport): void {
    if (report.aborted) {
      this.#log?.("%s: acknowledgment wait cut short", what);
    } else if (!report.confirmed) {
      this.#log?.("%s: unconfirmed after %d transmissions, continuing", what, report.transmissions);
    }
  }
}
