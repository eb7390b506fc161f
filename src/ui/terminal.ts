import { COMMAND_HELP } from "../cli/commands.js";
import type { ColorName, ConsoleLogger } from "../util/logging.js";

export interface TerminalTheme {
  primary: ColorName;
  secondary: ColorName;
  success: ColorName;
  warning: ColorName;
}

export const THEME: TerminalTheme = {
  primary: "blue",
  secondary: "cyan",
  success: "green",
  warning: "yellow",
};

export class TerminalUI {
  constructor(private readonly log: ConsoleLogger) {}

  getPrompt(): string {
    return this.log.colors.dim("you") + this.log.colors[THEME.primary](" > ");
  }

  showWelcome(session: { provider: string; model: string }): void {
    const { log } = this;
    log.raw("");
    log.raw(log.colors[THEME.primary]("🤖 parley") + log.colors.dim(" — OpenAI / Anthropic chat"));
    log.raw("");
    log.raw(`  ${log.colors.dim("Provider:")} ${log.colors[THEME.secondary](session.provider)} (${session.model})`);
    log.raw("");
    log.raw(log.colors[THEME.success]("✅ Ready! Type a message, '/help' for commands or '/quit' to leave"));
    log.raw("");
  }

  showHelp(): void {
    const { log } = this;
    log.raw("");
    log.raw(log.colors[THEME.primary]("Available Commands:"));
    for (const { cmd, desc } of COMMAND_HELP) {
      log.raw(`  ${log.colors[THEME.secondary](cmd.padEnd(20))} ${log.colors.dim(`— ${desc}`)}`);
    }
    log.raw("");
  }

  showReply(content: string): void {
    this.log.raw("");
    this.log.raw(`${this.log.colors[THEME.primary]("Assistant:")} ${content}`);
    this.log.raw("");
  }

  showCostWarning(totalCost: number): void {
    this.log.raw(this.log.colors[THEME.warning](`⚠️  Cost Warning: $${totalCost.toFixed(6)}`));
    this.log.raw("");
  }

  showBlock(text: string): void {
    this.log.raw("");
    this.log.raw(text);
    this.log.raw("");
  }
}
