/**
 * Client configuration.
 *
 * One frozen {@link ClientConfig} is built at startup and handed to every
 * component at construction. Nothing reads configuration from globals.
 */

import { z } from "zod";

export const DEFAULT_PORT = 4567;
export const DEFAULT_CONFIRM_TIMEOUT_MS = 250;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_REPLY_TIMEOUT_MS = 5000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

export const TransportKindSchema = z.enum(["tcp", "udp"]);

/** Which wire format and link to use. */
export type TransportKind = z.infer<typeof TransportKindSchema>;

export const ClientConfigSchema = z.object({
  transport: TransportKindSchema,
  host: z.string().min(1, "host must not be empty"),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  /** How long to wait for a datagram acknowledgment before retransmitting. */
  confirmTimeoutMs: z.number().int().positive().default(DEFAULT_CONFIRM_TIMEOUT_MS),
  /** Retransmissions after the first send. */
  maxRetries: z.number().int().min(0).max(255).default(DEFAULT_MAX_RETRIES),
  /** How long an authenticate or join waits for its reply. */
  replyTimeoutMs: z.number().int().positive().default(DEFAULT_REPLY_TIMEOUT_MS),
  connectTimeoutMs: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
  verbose: z.boolean().default(false),
});

export type ClientConfig = Readonly<z.infer<typeof ClientConfigSchema>>;

/** Input accepted by {@link resolveConfig}; defaults fill the gaps. */
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

/** Validate, apply defaults and freeze. Throws a ZodError on bad input. */
export function resolveConfig(input: ClientConfigInput): ClientConfig {
  return Object.freeze(ClientConfigSchema.parse(input));
}

/** One-line description of the effective configuration. */
export function describeConfig(config: ClientConfig): string {
  return [
    `transport=${config.transport}`,
    `server=${config.host}:${config.port}`,
    `confirmTimeout=${config.confirmTimeoutMs}ms`,
    `retries=${config.maxRetries}`,
    `replyTimeout=${config.replyTimeoutMs}ms`,
  ].join(" ");
}
