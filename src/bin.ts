#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ZodError } from "zod";
import { resolveConfig, type ClientConfig } from "./sdk/config.js";

// --- Parse CLI args ---

const argv = await yargs(hideBin(process.argv))
  .scriptName("chatline")
  .usage("Usage: $0 -t <tcp|udp> -s <server> [options]")
  .option("transport", {
    alias: "t",
    type: "string",
    choices: ["tcp", "udp"] as const,
    demandOption: true,
    describe: "Transport protocol",
  })
  .option("server", {
    alias: "s",
    type: "string",
    demandOption: true,
    describe: "Server hostname or IP address",
  })
  .option("port", {
    alias: "p",
    type: "number",
    default: 4567,
    describe: "Server port",
  })
  .option("timeout", {
    alias: "d",
    type: "number",
    default: 250,
    describe: "UDP confirmation timeout in milliseconds",
  })
  .option("retries", {
    alias: "r",
    type: "number",
    default: 3,
    describe: "Maximum number of UDP retransmissions",
  })
  .option("verbose", {
    alias: "v",
    type: "boolean",
    default: false,
    describe: "Trace protocol activity on stderr",
  })
  .version(false)
  .help()
  .alias("help", "h")
  .strict()
  .parse();

// --- Build config ---

let config: ClientConfig | null = null;
try {
  config = resolveConfig({
    transport: argv.transport,
    host: argv.server,
    port: argv.port,
    confirmTimeoutMs: argv.timeout,
    maxRetries: argv.retries,
    verbose: argv.verbose,
  });
} catch (err) {
  if (!(err instanceof ZodError)) throw err;
  for (const issue of err.issues) {
    process.stderr.write(`ERROR: ${issue.path.join(".")}: ${issue.message}\n`);
  }
  process.exitCode = 1;
}

// --- Run ---

if (config) {
  const { runChat } = await import("./commands/chat.js");
  process.exitCode = await runChat(config);
}
