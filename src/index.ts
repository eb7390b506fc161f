#!/usr/bin/env node
import readline from "node:readline";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { handleLine } from "./cli/repl.js";
import { loadSettings, maskSecret, type Env, type Settings } from "./config.js";
import { ConfigurationError } from "./error/errors.js";
import { PROVIDERS } from "./providers/index.js";
import { ChatSession, DEFAULT_SYSTEM_PROMPT } from "./state/session.js";
import { TerminalUI } from "./ui/terminal.js";
import { createLogger, LOG_LEVELS } from "./util/logging.js";

const argv = yargs(hideBin(process.argv))
  .scriptName("parley")
  .usage("$0 [options]")
  .option("provider", {
    alias: "p",
    type: "string",
    choices: PROVIDERS,
    describe: "Provider to start with (overrides DEFAULT_PROVIDER)",
  })
  .option("system", {
    alias: "s",
    type: "string",
    describe: "System prompt for the conversation",
  })
  .option("log-level", {
    alias: "l",
    type: "string",
    choices: LOG_LEVELS,
    describe: "Log level (overrides LOG_LEVEL)",
  })
  .example("$0", "Chat with the default provider")
  .example("$0 --provider anthropic", "Start with Claude")
  .example('$0 -s "Answer in French"', "Use a custom system prompt")
  .version()
  .help()
  .parseSync();

function cliOverrides(): Env {
  const overrides: Env = {};
  if (argv.provider) overrides.DEFAULT_PROVIDER = argv.provider;
  if (argv.logLevel) overrides.LOG_LEVEL = argv.logLevel;
  return overrides;
}

(async () => {
  let settings: Settings;
  try {
    settings = loadSettings(cliOverrides());
  } catch (error) {
    const log = createLogger();
    log.error(error instanceof ConfigurationError ? error.message : `Fatal error: ${String(error)}`);
    log.info("Copy .env.example to .env and fill in both API keys");
    process.exit(1);
  }

  const log = createLogger({ level: settings.logLevel });
  log.debug(
    `Settings loaded (openai key ${maskSecret(settings.openaiApiKey)}, anthropic key ${maskSecret(settings.anthropicApiKey)})`
  );

  const ui = new TerminalUI(log);
  const session = new ChatSession({
    settings,
    logger: log,
    systemPrompt: argv.system ?? DEFAULT_SYSTEM_PROMPT,
  });

  try {
    const provider = await session.switchProvider(settings.defaultProvider);
    ui.showWelcome({ provider: provider.id, model: provider.model });
  } catch (error) {
    log.error("Fatal error:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: ui.getPrompt(),
    historySize: 100,
  });

  let closing = false;

  const shutdown = async (): Promise<void> => {
    await session.close();
    if (session.ledger.entries.length > 0) {
      ui.showBlock(session.ledger.summary());
    }
    log.info("Goodbye!");
  };

  rl.on("line", (line) => {
    handleLine(line, { session, ui, log })
      .then((outcome) => {
        if (outcome === "quit") {
          rl.close();
        } else if (!closing) {
          rl.prompt();
        }
      })
      .catch((error: unknown) => {
        log.error("Unhandled error:", error instanceof Error ? error.message : String(error));
        rl.prompt();
      });
  });

  rl.on("close", () => {
    closing = true;
    shutdown()
      .catch((error: unknown) => {
        log.error("Cleanup failed:", error instanceof Error ? error.message : String(error));
      })
      .finally(() => process.exit(0));
  });

  rl.prompt();
})().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
