import chalk from "chalk";
import type { SessionEffect } from "../sdk/effects.js";
import { matchEffect } from "../sdk/match.js";
import type { PendingRequest } from "../state/types.js";

const REQUEST_LABELS: Record<PendingRequest, string> = {
  authentication: "authentication",
  join: "join",
};

/** A local failure, as the user sees it. */
export function formatError(message: string): string {
  return `${chalk.red("ERROR:")} ${message}`;
}

/** The line an effect prints, or null for effects with no output. */
export function formatEffect(effect: SessionEffect): string | null {
  return matchEffect<string | null>(effect, {
    reply: (e) =>
      e.success ? `${chalk.green("Action Success:")} ${e.content}` : `${chalk.red("Action Failure:")} ${e.content}`,
    replyTimeout: (e) => formatError(`No reply to ${REQUEST_LABELS[e.request]} request`),
    chat: (e) => `${chalk.bold(e.sender)}: ${e.content}`,
    peerError: (e) => `${chalk.red(`ERROR FROM ${e.sender}:`)} ${e.content}`,
    peerFarewell: () => null,
    protocolFault: (e) => formatError(e.reason),
    connectionLost: (e) => formatError(e.message),
    terminated: () => null,
  });
}
