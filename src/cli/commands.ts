import { isProviderId, PROVIDERS, type ProviderId } from "../providers/index.js";
import type { Message } from "../state/conversation.js";

export type Command =
  | { type: "help" }
  | { type: "clear" }
  | { type: "quit" }
  | { type: "cost" }
  | { type: "history" }
  | { type: "switch"; provider: ProviderId }
  | { type: "invalid"; message: string };

export const COMMAND_HELP: ReadonlyArray<{ cmd: string; desc: string }> = [
  { cmd: "/help", desc: "Show this help message" },
  { cmd: "/clear", desc: "Clear conversation history" },
  { cmd: "/quit, /exit", desc: "Exit the application" },
  { cmd: "/model <provider>", desc: `Switch provider (${PROVIDERS.join(" or ")})` },
  { cmd: "/cost", desc: "Show cost summary" },
  { cmd: "/history", desc: "Show conversation history" },
];

export const MODEL_USAGE = `Usage: /model <${PROVIDERS.join("|")}>`;

/**
 * Recognises slash commands. Returns null for plain chat input and for
 * slash input that matches no command.
 */
export function parseCommand(input: string): Command | null {
  const command = input.trim().toLowerCase();
  if (!command.startsWith("/")) return null;

  switch (command) {
    case "/help":
      return { type: "help" };
    case "/clear":
      return { type: "clear" };
    case "/quit":
    case "/exit":
      return { type: "quit" };
    case "/cost":
      return { type: "cost" };
    case "/history":
      return { type: "history" };
  }

  const parts = command.split(/\s+/);
  if (parts[0] !== "/model") return null;

  if (parts.length !== 2) {
    return { type: "invalid", message: MODEL_USAGE };
  }
  const provider = parts[1];
  if (!isProviderId(provider)) {
    return { type: "invalid", message: `Provider must be one of: ${PROVIDERS.join(", ")}` };
  }
  return { type: "switch", provider };
}

export function formatHistory(messages: readonly Message[]): string {
  if (messages.length === 0) {
    return "No conversation history yet.";
  }

  const rule = "=".repeat(60);
  const lines = ["Conversation History:", rule];
  for (const msg of messages) {
    lines.push(`${msg.role.toUpperCase()}: ${msg.content.slice(0, 100)}...`);
  }
  lines.push(rule);
  return lines.join("\n");
}
