import type { ConsoleLogger } from "../util/logging.js";
import {
  AuthenticationError,
  ConfigurationError,
  CostLimitExceededError,
  InvalidRequestError,
  NotInitializedError,
  ProviderConnectionError,
  RateLimitedError,
  errorMessage,
} from "./errors.js";

export type ErrorCategory = "network" | "auth" | "config" | "provider" | "budget" | "unknown";

export interface ErrorReport {
  category: ErrorCategory;
  message: string;
  suggestions: string[];
}

interface ErrorPattern {
  matches: (error: unknown) => boolean;
  category: ErrorCategory;
  suggestions: string[];
}

const byClass = (ctor: new (...args: never[]) => Error) => (error: unknown) => error instanceof ctor;

const errorPatterns: ErrorPattern[] = [
  {
    matches: byClass(AuthenticationError),
    category: "auth",
    suggestions: [
      "Check the API key in your .env file",
      "Switch provider with '/model <provider>'",
      "Verify the key has not been revoked",
    ],
  },
  {
    matches: byClass(RateLimitedError),
    category: "provider",
    suggestions: [
      "Wait a moment before retrying",
      "Switch to the other provider with '/model <provider>'",
      "Check usage limits in the provider dashboard",
    ],
  },
  {
    matches: byClass(ProviderConnectionError),
    category: "network",
    suggestions: [
      "Check internet connection",
      "Send the message again",
      "Try the other provider with '/model <provider>'",
    ],
  },
  {
    matches: byClass(InvalidRequestError),
    category: "provider",
    suggestions: [
      "Shorten the conversation with '/clear'",
      "Lower MAX_TOKENS in your .env file",
    ],
  },
  {
    matches: byClass(CostLimitExceededError),
    category: "budget",
    suggestions: ["Raise COST_LIMIT_THRESHOLD in your .env file and restart"],
  },
  {
    matches: (error) => error instanceof ConfigurationError || error instanceof NotInitializedError,
    category: "config",
    suggestions: ["Check your .env file against .env.example", "Pick a provider with '/model <provider>'"],
  },
  // Anything else that reads like a transport problem
  {
    matches: (error) => /network|connection|timeout|ECONNREFUSED|ENOTFOUND/i.test(errorMessage(error)),
    category: "network",
    suggestions: ["Check internet connection"],
  },
];

const categoryEmojis: Record<ErrorCategory, string> = {
  network: "🌐",
  auth: "🔐",
  config: "⚙️",
  provider: "🤖",
  budget: "💰",
  unknown: "❌",
};

export function describeError(error: unknown): ErrorReport {
  const pattern = errorPatterns.find((p) => p.matches(error));
  return {
    category: pattern?.category ?? "unknown",
    message: errorMessage(error),
    suggestions: pattern?.suggestions.slice(0, 3) ?? ["Please try again or use /quit to exit."],
  };
}

/**
 * Prints an error for the REPL user: category, message and up to three
 * suggestions.
 */
export function showError(log: ConsoleLogger, error: unknown): ErrorReport {
  const report = describeError(error);

  log.raw("");
  log.raw(`${categoryEmojis[report.category]} ${log.colors.red("Error")} (${report.category}): ${report.message}`);
  log.raw("");
  log.raw(log.colors.yellow("💡 Suggestions:"));
  report.suggestions.forEach((suggestion, i) => {
    log.raw(`  ${i + 1}. ${suggestion}`);
  });
  log.raw("");

  return report;
}
