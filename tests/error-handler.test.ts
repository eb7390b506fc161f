import { afterEach, describe, expect, it, vi } from "vitest";

import {
  AuthenticationError,
  ConfigurationError,
  CostLimitExceededError,
  NotInitializedError,
  ProviderConnectionError,
  RateLimitedError,
} from "../src/error/errors.js";
import { describeError, showError } from "../src/error/handler.js";
import { createLogger } from "../src/util/logging.js";

describe("describeError", () => {
  it("categorises provider failures by class", () => {
    expect(describeError(new AuthenticationError("openai", "bad key")).category).toBe("auth");
    expect(describeError(new RateLimitedError("openai", "slow")).category).toBe("provider");
    expect(describeError(new ProviderConnectionError("anthropic", "down")).category).toBe("network");
    expect(describeError(new CostLimitExceededError(1.5)).category).toBe("budget");
    expect(describeError(new NotInitializedError()).category).toBe("config");
    expect(describeError(new ConfigurationError("missing key")).category).toBe("config");
  });

  it("recognises transport errors by message", () => {
    expect(describeError(new Error("connect ECONNREFUSED 127.0.0.1:443")).category).toBe("network");
  });

  it("falls back to a generic suggestion", () => {
    expect(describeError("weird")).toEqual({
      category: "unknown",
      message: "weird",
      suggestions: ["Please try again or use /quit to exit."],
    });
  });
});

describe("showError", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the category, message and numbered suggestions", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const report = showError(createLogger({ color: false }), new AuthenticationError("openai", "bad key"));

    expect(report.category).toBe("auth");
    expect(out.mock.calls.map(([line]) => line)).toEqual([
      "",
      "🔐 Error (auth): bad key",
      "",
      "💡 Suggestions:",
      "  1. Check the API key in your .env file",
      "  2. Switch provider with '/model <provider>'",
      "  3. Verify the key has not been revoked",
      "",
    ]);
  });
});
