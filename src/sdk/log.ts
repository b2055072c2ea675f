/**
 * Debug logging.
 *
 * Every component logs through a `debug` namespace `chatline:<scope>`.
 * Namespaces follow the `DEBUG` environment variable unless the client runs
 * verbose, which switches them all on. Output goes to stderr, so stdout
 * carries only chat output.
 */

import createDebug, { type Debugger } from "debug";

export type LogScope = "session" | "tcp" | "udp" | "reliability" | "shutdown" | "cli";

export type Logger = Debugger;

/** Create the logger for one component. */
export function createLogger(scope: LogScope, verbose = false): Logger {
  const log = createDebug(`chatline:${scope}`);
  if (verbose) log.enabled = true;
  return log;
}

/** Space-separated hex bytes, truncated after `max` bytes. */
export function hexDump(bytes: Uint8Array, max = 64): string {
  const shown = Array.from(bytes.subarray(0, max), (b) => b.toString(16).padStart(2, "0"));
  const rest = bytes.length > max ? ` …(+${bytes.length - max})` : "";
  return shown.join(" ") + rest;
}
