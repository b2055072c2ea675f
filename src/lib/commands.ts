/** A line of user input, interpreted. */
export type UserCommand =
  | { readonly kind: "auth"; readonly username: string; readonly secret: string; readonly displayName: string }
  | { readonly kind: "join"; readonly channel: string }
  | { readonly kind: "rename"; readonly displayName: string }
  | { readonly kind: "help" }
  | { readonly kind: "message"; readonly content: string }
  | { readonly kind: "empty" }
  | { readonly kind: "invalid"; readonly message: string };

export const USAGE = {
  auth: "Usage: /auth <username> <secret> <displayname>",
  join: "Usage: /join <channel>",
  rename: "Usage: /rename <displayname>",
} as const;

/** Convert an unknown error value to a human-readable string. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Parse a slash-command string into command name and arguments. */
export function parseCommand(input: string): { cmd: string; args: string[] } {
  const parts = input.trim().slice(1).split(/\s+/).filter((p) => p.length > 0);
  const cmd = parts[0] ?? "";
  return { cmd, args: parts.slice(1) };
}

/**
 * Interpret one input line. Lines starting with `/` are commands; anything
 * else is sent verbatim as a chat message.
 */
export function parseInput(line: string): UserCommand {
  if (line.trim().length === 0) return { kind: "empty" };
  if (!line.startsWith("/")) return { kind: "message", content: line };

  const { cmd, args } = parseCommand(line);
  switch (cmd) {
    case "auth": {
      const [username, secret, displayName] = args;
      if (args.length !== 3 || !username || !secret || !displayName) {
        return { kind: "invalid", message: USAGE.auth };
      }
      return { kind: "auth", username, secret, displayName };
    }
    case "join": {
      const [channel] = args;
      if (args.length !== 1 || !channel) return { kind: "invalid", message: USAGE.join };
      return { kind: "join", channel };
    }
    case "rename": {
      const [displayName] = args;
      if (args.length !== 1 || !displayName) return { kind: "invalid", message: USAGE.rename };
      return { kind: "rename", displayName };
    }
    case "help":
      return { kind: "help" };
    default:
      return { kind: "invalid", message: "Unknown command. Use /help for available commands" };
  }
}

/** Build the static help message. */
export function buildHelpMessage(): string {
  return [
    "Available commands:",
    "  /auth <username> <secret> <displayname>  authenticate with the server",
    "  /join <channel>                          join a channel",
    "  /rename <displayname>                    change your display name",
    "  /help                                    show this help",
    "Anything else is sent as a message. Ctrl+C or Ctrl+D leaves.",
  ].join("\n");
}
