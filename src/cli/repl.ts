import { CostLimitExceededError } from "../error/errors.js";
import { showError } from "../error/handler.js";
import type { ChatSession } from "../state/session.js";
import type { TerminalUI } from "../ui/terminal.js";
import type { ConsoleLogger } from "../util/logging.js";
import { formatHistory, parseCommand } from "./commands.js";

export interface ReplContext {
  session: ChatSession;
  ui: TerminalUI;
  log: ConsoleLogger;
}

export type LineOutcome = "continue" | "quit";

/**
 * Handles one line of REPL input. Errors are shown to the user and the loop
 * goes on, except for the cost limit, which ends it.
 */
export async function handleLine(line: string, ctx: ReplContext): Promise<LineOutcome> {
  const input = line.trim();
  if (!input) return "continue";

  const { session, ui, log } = ctx;

  try {
    const command = parseCommand(input);

    if (!command) {
      if (input.startsWith("/")) {
        log.warn(`Unknown command: ${input}. Type /help for available commands`);
        return "continue";
      }

      const reply = await session.send(input);
      ui.showReply(reply);
      if (session.ledger.shouldWarn()) {
        ui.showCostWarning(session.ledger.totalCost());
      }
      return "continue";
    }

    switch (command.type) {
      case "help":
        ui.showHelp();
        break;
      case "clear":
        session.conversation.clear();
        log.success("Conversation history cleared!");
        break;
      case "quit":
        return "quit";
      case "cost":
        ui.showBlock(session.ledger.summary());
        break;
      case "history":
        ui.showBlock(formatHistory(session.conversation.messages));
        break;
      case "switch": {
        log.step("Switching", command.provider.toUpperCase());
        const provider = await session.switchProvider(command.provider);
        log.success(`Now using ${provider.id.toUpperCase()} (${provider.model})`);
        break;
      }
      case "invalid":
        log.error(command.message);
        break;
    }
    return "continue";
  } catch (error) {
    showError(log, error);
    return error instanceof CostLimitExceededError ? "quit" : "continue";
  }
}
