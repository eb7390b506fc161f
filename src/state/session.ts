import type { Settings } from "../config.js";
import {
  ConfigurationError,
  CostLimitExceededError,
  NotInitializedError,
} from "../error/errors.js";
import { createProvider, isProviderId, PROVIDERS, type Provider, type ProviderId, type LLMResponse } from "../providers/index.js";
import { CostLedger } from "../util/costs.js";
import { errorEvent, type Logger } from "../util/logging.js";
import { Mutex } from "../util/mutex.js";
import { Conversation } from "./conversation.js";

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful AI assistant. Be concise and friendly.";

export type SessionSettings = Pick<
  Settings,
  "openaiApiKey" | "anthropicApiKey" | "temperature" | "maxTokens" | "costWarningThreshold" | "costLimitThreshold"
>;

export type ProviderFactory = (id: ProviderId) => Provider;

export interface ChatSessionOptions {
  settings: SessionSettings;
  logger: Logger;
  systemPrompt?: string;
  maxRetries?: number;
  providerFactory?: ProviderFactory;
}

type SessionState =
  | { status: "uninitialized" }
  | { status: "active"; provider: Provider };

/**
 * One chat session: the active provider, the transcript and the cost ledger.
 *
 * `send` and `switchProvider` share a FIFO lock, so a provider switch never
 * lands in the middle of an exchange and overlapping sends run one at a time.
 */
export class ChatSession {
  readonly conversation: Conversation;
  readonly ledger: CostLedger;

  private readonly logger: Logger;
  private readonly factory: ProviderFactory;
  private readonly lock = new Mutex();
  private state: SessionState = { status: "uninitialized" };

  constructor(opts: ChatSessionOptions) {
    const { settings, logger } = opts;

    this.logger = logger;
    this.conversation = new Conversation({ systemPrompt: opts.systemPrompt });
    this.ledger = new CostLedger({
      warningThreshold: settings.costWarningThreshold,
      limitThreshold: settings.costLimitThreshold,
    });
    this.factory = opts.providerFactory ?? ((id) =>
      createProvider(id, {
        apiKey: id === "openai" ? settings.openaiApiKey : settings.anthropicApiKey,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
        maxRetries: opts.maxRetries,
        onRetry: (error, attempt, delayMs) =>
          logger.warn(`${id} attempt ${attempt + 1} failed (${error.message}), retrying in ${delayMs / 1000}s`),
      }));
  }

  get provider(): Provider | undefined {
    return this.state.status === "active" ? this.state.provider : undefined;
  }

  get providerId(): ProviderId | undefined {
    return this.provider?.id;
  }

  /**
   * Replaces the active provider. The old one is closed first; a failing
   * close is logged and otherwise ignored.
   */
  switchProvider(name: string): Promise<Provider> {
    return this.lock.runExclusive(async () => {
      if (!isProviderId(name)) {
        throw new ConfigurationError(`Unknown provider: ${name}. Available: ${PROVIDERS.join(", ")}`);
      }

      await this.closeProvider();
      const provider = this.factory(name);
      this.state = { status: "active", provider };
      this.logger.info(`Initialized provider: ${provider.name} (model: ${provider.model})`);
      return provider;
    });
  }

  send(text: string): Promise<string> {
    return this.lock.runExclusive(() => this.exchange(text));
  }

  async close(): Promise<void> {
    await this.closeProvider();
  }

  private async exchange(text: string): Promise<string> {
    if (this.state.status !== "active") {
      const error = new NotInitializedError();
      this.logger.failure(errorEvent(error, "send"));
      throw error;
    }
    const { provider } = this.state;

    // Checked before anything is appended, so a refused send leaves no trace
    if (this.ledger.shouldStop()) {
      const error = new CostLimitExceededError(this.ledger.totalCost());
      this.logger.failure(errorEvent(error, "send"));
      throw error;
    }

    // The user turn stays in history even if the call below fails
    this.conversation.addUser(text);

    let response: LLMResponse;
    try {
      response = await provider.chat(this.conversation.toWire());
    } catch (error) {
      this.logger.failure(errorEvent(error, `${provider.id} chat`));
      throw error;
    }

    this.conversation.addAssistant(response.content);

    // Priced by the model the backend reports, which may differ from the one requested
    const cost = this.ledger.record(provider.id, response.model, response.inputTokens, response.outputTokens);
    this.logger.apiCall({
      provider: provider.id,
      model: response.model,
      inputTokens: response.inputTokens,
      outputTokens: response.outputTokens,
      cost,
    });

    if (this.ledger.shouldWarn()) {
      this.logger.warn(`Cost warning! Total: $${this.ledger.totalCost().toFixed(6)}`);
    }

    return response.content;
  }

  private async closeProvider(): Promise<void> {
    if (this.state.status !== "active") return;
    const { provider } = this.state;
    this.state = { status: "uninitialized" };

    try {
      await provider.close();
      this.logger.debug(`Closed provider: ${provider.name}`);
    } catch (error) {
      this.logger.failure(errorEvent(error, "Error closing provider"));
    }
  }
}
