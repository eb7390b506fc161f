import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { formatHistory } from "../src/cli/commands.js";
import { handleLine, type ReplContext } from "../src/cli/repl.js";
import { ProviderConnectionError } from "../src/error/errors.js";
import type { ProviderId } from "../src/providers/types.js";
import { ChatSession, type SessionSettings } from "../src/state/session.js";
import { TerminalUI } from "../src/ui/terminal.js";
import { createLogger } from "../src/util/logging.js";
import { FakeProvider, fakeLogger, reply, testSettings } from "./fakes.js";

async function setup(settings: Partial<SessionSettings> = {}) {
  const providers: FakeProvider[] = [];
  const session = new ChatSession({
    settings: testSettings(settings),
    logger: fakeLogger(),
    systemPrompt: "Be brief.",
    providerFactory: (id: ProviderId) => {
      const provider = new FakeProvider(id, id === "openai" ? "gpt-4o-mini" : "claude-3-5-haiku-20241022");
      provider.chat.mockResolvedValue(reply("Hi there"));
      providers.push(provider);
      return provider;
    },
  });
  await session.switchProvider("openai");

  const log = createLogger({ color: false });
  const ctx: ReplContext = { session, ui: new TerminalUI(log), log };
  return { ctx, session, providers };
}

function spyOnConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => undefined),
    warn: vi.spyOn(console, "warn").mockImplementation(() => undefined),
    error: vi.spyOn(console, "error").mockImplementation(() => undefined),
  };
}

describe("handleLine", () => {
  let out: ReturnType<typeof spyOnConsole>;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-01-02T03:04:05Z"));
    out = spyOnConsole();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("ignores blank lines", async () => {
    const { ctx } = await setup();

    await expect(handleLine("   ", ctx)).resolves.toBe("continue");
    expect(out.log).not.toHaveBeenCalled();
  });

  it("sends chat text and shows the reply", async () => {
    const { ctx, providers } = await setup();

    await expect(handleLine("  Hello  ", ctx)).resolves.toBe("continue");

    expect(providers[0].chat).toHaveBeenCalledWith([
      { role: "system", content: "Be brief." },
      { role: "user", content: "Hello" },
    ]);
    expect(out.log).toHaveBeenCalledWith("Assistant: Hi there");
  });

  it("shows a cost warning after a reply that crosses the threshold", async () => {
    const { ctx } = await setup({ costWarningThreshold: 0.0001 });

    await handleLine("Hello", ctx);

    expect(out.log).toHaveBeenCalledWith("⚠️  Cost Warning: $0.000450");
  });

  it("ends the loop on /quit", async () => {
    const { ctx } = await setup();

    await expect(handleLine("/quit", ctx)).resolves.toBe("quit");
    await expect(handleLine("/EXIT", ctx)).resolves.toBe("quit");
  });

  it("clears history on /clear", async () => {
    const { ctx, session } = await setup();
    await handleLine("Hello", ctx);

    await handleLine("/clear", ctx);

    expect(session.conversation.toWire()).toEqual([{ role: "system", content: "Be brief." }]);
    expect(out.log).toHaveBeenCalledWith("03:04:05 ✓ Conversation history cleared!");
  });

  it("switches provider on /model", async () => {
    const { ctx, session, providers } = await setup();

    await expect(handleLine("/model anthropic", ctx)).resolves.toBe("continue");

    expect(session.providerId).toBe("anthropic");
    expect(providers[0].close).toHaveBeenCalledTimes(1);
    expect(out.log).toHaveBeenCalledWith("03:04:05 → Switching: ANTHROPIC");
    expect(out.log).toHaveBeenCalledWith("03:04:05 ✓ Now using ANTHROPIC (claude-3-5-haiku-20241022)");
  });

  it("reports a bad /model argument without switching", async () => {
    const { ctx, session } = await setup();

    await handleLine("/model gemini", ctx);

    expect(session.providerId).toBe("openai");
    expect(out.error).toHaveBeenCalledWith("03:04:05 error Provider must be one of: openai, anthropic");
  });

  it("warns about unknown commands", async () => {
    const { ctx, providers } = await setup();

    await expect(handleLine("/foo", ctx)).resolves.toBe("continue");

    expect(providers[0].chat).not.toHaveBeenCalled();
    expect(out.warn).toHaveBeenCalledWith("03:04:05 warn Unknown command: /foo. Type /help for available commands");
  });

  it("prints the cost summary and the history", async () => {
    const { ctx, session } = await setup();
    await handleLine("Hello", ctx);

    await handleLine("/cost", ctx);
    await handleLine("/history", ctx);

    expect(out.log).toHaveBeenCalledWith(session.ledger.summary());
    expect(out.log).toHaveBeenCalledWith(formatHistory(session.conversation.messages));
  });

  it("keeps going after a provider failure", async () => {
    const { ctx, providers } = await setup();
    providers[0].chat.mockRejectedValueOnce(new ProviderConnectionError("openai", "Connection failed: down"));

    await expect(handleLine("Hello", ctx)).resolves.toBe("continue");

    expect(out.log).toHaveBeenCalledWith("🌐 Error (network): Connection failed: down");
  });

  it("stops once the cost limit is reached", async () => {
    const { ctx, providers } = await setup({ costLimitThreshold: 0 });

    await expect(handleLine("Hello", ctx)).resolves.toBe("quit");

    expect(providers[0].chat).not.toHaveBeenCalled();
    expect(out.log).toHaveBeenCalledWith("💰 Error (budget): Cost limit reached! Total: $0.000000");
  });
});
