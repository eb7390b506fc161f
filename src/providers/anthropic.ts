import { Agent } from "node:https";
import Anthropic from "@anthropic-ai/sdk";
import {
  AuthenticationError,
  InvalidRequestError,
  ProviderConnectionError,
  ProviderError,
  RateLimitedError,
} from "../error/errors.js";
import { DEFAULT_MAX_RETRIES, withRetry } from "./retry.js";
import {
  approximateTokens,
  type ChatMsg,
  type ChatOptions,
  type LLMResponse,
  type Provider,
  type ProviderOptions,
} from "./types.js";

export const ANTHROPIC_DEFAULT_MODEL = "claude-3-5-haiku-20241022";

export type AnthropicTurn = { role: "user" | "assistant"; content: string };

export interface AnthropicMessageRequest {
  model: string;
  messages: AnthropicTurn[];
  system?: string;
  temperature: number;
  max_tokens: number;
}

export interface AnthropicMessage {
  model: string;
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
  stop_reason: string | null;
}

export type AnthropicTransport = (request: AnthropicMessageRequest) => Promise<AnthropicMessage>;

export interface AnthropicProviderOptions extends ProviderOptions {
  transport?: AnthropicTransport;
}

/**
 * Splits a chat transcript into Anthropic's shape: the first system message
 * travels in the `system` field, the user/assistant turns keep their order.
 * The Messages API has no system role, so later system messages are not sent.
 */
export function splitSystemPrompt(messages: ChatMsg[]): { system?: string; turns: AnthropicTurn[] } {
  let system: string | undefined;
  const turns: AnthropicTurn[] = [];

  for (const m of messages) {
    if (m.role === "system") {
      if (system === undefined) system = m.content;
      continue;
    }
    turns.push({ role: m.role, content: m.content });
  }

  return { system, turns };
}

export function classifyAnthropicError(error: unknown): ProviderError | undefined {
  if (error instanceof Anthropic.APIConnectionError) {
    return new ProviderConnectionError("anthropic", `Connection failed: ${error.message}`, { cause: error });
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new RateLimitedError("anthropic", `Rate limit exceeded: ${error.message}`, { cause: error });
  }
  if (error instanceof Anthropic.AuthenticationError) {
    return new AuthenticationError("anthropic", `Authentication failed: ${error.message}`, { cause: error });
  }
  if (error instanceof Anthropic.BadRequestError) {
    return new InvalidRequestError("anthropic", `Invalid request: ${error.message}`, { cause: error });
  }
  return undefined;
}

export class AnthropicProvider implements Provider {
  readonly id = "anthropic" as const;
  readonly name = "Anthropic";
  readonly model: string;

  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly maxRetries: number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  private readonly transport: AnthropicTransport;
  private readonly agent: Agent | null;
  private closed = false;

  constructor(opts: AnthropicProviderOptions) {
    this.model = opts.model ?? ANTHROPIC_DEFAULT_MODEL;
    this.temperature = opts.temperature ?? 0.7;
    this.maxTokens = opts.maxTokens ?? 1000;
    this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.sleep = opts.sleep;
    this.onRetry = opts.onRetry;

    if (opts.transport) {
      this.agent = null;
      this.transport = opts.transport;
    } else {
      const agent = new Agent({ keepAlive: true });
      const client = new Anthropic({ apiKey: opts.apiKey, maxRetries: 0, httpAgent: agent });
      this.agent = agent;
      this.transport = (request) => client.messages.create(request);
    }
  }

  async chat(messages: ChatMsg[], opts: ChatOptions = {}): Promise<LLMResponse> {
    if (this.closed) {
      throw new ProviderConnectionError(this.id, "provider is closed");
    }

    const { system, turns } = splitSystemPrompt(messages);
    const request: AnthropicMessageRequest = {
      model: this.model,
      messages: turns,
      temperature: opts.temperature ?? this.temperature,
      max_tokens: opts.maxTokens ?? this.maxTokens,
      ...(system ? { system } : {}),
    };

    return withRetry(
      async () => {
        const res = await this.transport(request);
        const content = res.content
          .map((block) => (block.type === "text" && block.text !== undefined ? block.text : ""))
          .join("");

        return {
          content,
          inputTokens: res.usage.input_tokens,
          outputTokens: res.usage.output_tokens,
          model: res.model,
          finishReason: res.stop_reason ?? undefined,
        };
      },
      {
        provider: this.id,
        maxRetries: this.maxRetries,
        classify: classifyAnthropicError,
        sleep: this.sleep,
        onRetry: this.onRetry,
      }
    );
  }

  // No public tokenizer for Claude models
  countTokens(text: string): number {
    return approximateTokens(text);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.agent?.destroy();
  }

  toString(): string {
    return `${this.id.toUpperCase()} Provider (model: ${this.model})`;
  }
}
