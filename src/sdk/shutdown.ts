/**
 * Graceful, bounded, idempotent session teardown.
 *
 * Stages run in order, each under its own deadline and all under one
 * overall budget:
 *
 * 1. **notify**: tell the peer (error frame and/or farewell)
 * 2. **flush**: wait for outstanding acknowledgments
 * 3. **close**: release the link
 */

import { toError } from "./errors.js";
import type { Logger } from "./log.js";
import type { ProtocolTransport } from "./adapters/adapter.js";
import type { TerminationReason } from "../state/types.js";

export type StageOutcome = "done" | "timeout" | "skipped" | "failed";

export interface ShutdownReport {
  readonly reason: TerminationReason;
  readonly notify: StageOutcome;
  readonly flush: StageOutcome;
  readonly close: StageOutcome;
  readonly elapsedMs: number;
}

/** What the notify stage should say. Computed when shutdown starts. */
export interface ShutdownPlan {
  readonly reason: TerminationReason;
  /** Display name the frames go out under. */
  readonly displayName: string;
  /** Content of an error frame to send first, if any. */
  readonly errorContent: string | null;
  /** Whether to send a farewell. */
  readonly farewell: boolean;
}

export interface ShutdownBudgets {
  readonly notifyMs: number;
  readonly flushMs: number;
  readonly closeMs: number;
  readonly totalMs: number;
}

export const DEFAULT_SHUTDOWN_BUDGETS: ShutdownBudgets = {
  notifyMs: 1000,
  flushMs: 500,
  closeMs: 1000,
  totalMs: 3000,
};

export interface ShutdownOptions {
  readonly transport: ProtocolTransport;
  /** Ends in-flight command sends and the receive loop. */
  readonly abortActivity: () => void;
  readonly budgets?: ShutdownBudgets;
  readonly log?: Logger;
}

/** Causes after which the peer is not told anything. */
const SILENT_REASONS: ReadonlySet<TerminationReason> = new Set([
  "peer-error",
  "peer-farewell",
  "connection-lost",
]);

export class ShutdownCoordinator {
  readonly #transport: ProtocolTransport;
  readonly #abortActivity: () => void;
  readonly #budgets: ShutdownBudgets;
  readonly #log: Logger | undefined;
  #running: Promise<ShutdownReport> | null = null;

  constructor(opts: ShutdownOptions) {
    this.#transport = opts.transport;
    this.#abortActivity = opts.abortActivity;
    this.#budgets = opts.budgets ?? DEFAULT_SHUTDOWN_BUDGETS;
    this.#log = opts.log;
  }

  /** Whether shutdown has started. */
  get started(): boolean {
    return this.#running !== null;
  }

  /**
   * Start the sequence, or join the one already running. `plan` is only
   * called by the first caller.
   */
  run(plan: () => ShutdownPlan): Promise<ShutdownReport> {
    this.#running ??= this.#execute(plan());
    return this.#running;
  }

  async #execute(plan: ShutdownPlan): Promise<ShutdownReport> {
    const started = Date.now();
    const deadline = started + this.#budgets.totalMs;
    const remaining = (stageMs: number): number => Math.min(stageMs, deadline - Date.now());

    this.#log?.("shutdown: %s", plan.reason);
    this.#abortActivity();

    const notify = SILENT_REASONS.has(plan.reason)
      ? "skipped"
      : await this.#stage("notify", remaining(this.#budgets.notifyMs), (signal) => this.#notify(plan, signal));

    const flush = await this.#stage("flush", remaining(this.#budgets.flushMs), async (signal) =>
      (await this.#transport.flush(signal)) ? "done" : "timeout",
    );

    const close = await this.#stage("close", remaining(this.#budgets.closeMs), async () => {
      await this.#transport.disconnect();
      return "done";
    });

    const report: ShutdownReport = { reason: plan.reason, notify, flush, close, elapsedMs: Date.now() - started };
    this.#log?.("shutdown complete notify=%s flush=%s close=%s in %dms", notify, flush, close, report.elapsedMs);
    return report;
  }

  async #notify(plan: ShutdownPlan, signal: AbortSignal): Promise<StageOutcome> {
    if (plan.errorContent === null && !plan.farewell) return "skipped";
    if (plan.errorContent !== null) {
      await this.#transport.sendError(plan.displayName, plan.errorContent, { signal });
    }
    if (plan.farewell && !signal.aborted) {
      await this.#transport.sendFarewell(plan.displayName, { signal });
    }
    return "done";
  }

  /** Run one stage under a deadline. Never rejects. */
  async #stage(
    name: string,
    ms: number,
    task: (signal: AbortSignal) => Promise<StageOutcome>,
  ): Promise<StageOutcome> {
    if (ms <= 0) {
      this.#log?.("%s: no time left", name);
      return "timeout";
    }

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<StageOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve("timeout");
      }, ms);
    });

    try {
      const outcome = await Promise.race([task(controller.signal), expired]);
      if (outcome === "timeout") this.#log?.("%s: timed out after %dms", name, ms);
      return outcome;
    } catch (err) {
      this.#log?.("%s failed: %s", name, toError(err).message);
      return "failed";
    } finally {
      clearTimeout(timer);
    }
  }
}
