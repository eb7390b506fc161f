import { Agent } from "node:https";
import OpenAI from "openai";
import { get_encoding, type TiktokenEncoding } from "tiktoken";
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

export const OPENAI_DEFAULT_MODEL = "gpt-4o-mini";

export interface OpenAICompletionRequest {
  model: string;
  messages: ChatMsg[];
  temperature: number;
  max_tokens: number;
}

// The slice of a ChatCompletion we read
export interface OpenAICompletion {
  model: string;
  choices: Array<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
}

export type OpenAITransport = (request: OpenAICompletionRequest) => Promise<OpenAICompletion>;

export interface Tokenizer {
  encode(text: string): ArrayLike<number>;
  free(): void;
}

export interface OpenAIProviderOptions extends ProviderOptions {
  transport?: OpenAITransport;
  tokenizer?: Tokenizer | null;
}

export function encodingFor(model: string): TiktokenEncoding {
  return /^(gpt-4o|chatgpt-4o|o1|o3|o4)/.test(model) ? "o200k_base" : "cl100k_base";
}

function loadTokenizer(model: string): Tokenizer | null {
  try {
    return get_encoding(encodingFor(model));
  } catch {
    return null;
  }
}

export function classifyOpenAIError(error: unknown): ProviderError | undefined {
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderConnectionError("openai", `Connection failed: ${error.message}`, { cause: error });
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new RateLimitedError("openai", `Rate limit exceeded: ${error.message}`, { cause: error });
  }
  if (error instanceof OpenAI.AuthenticationError) {
    return new AuthenticationError("openai", `Authentication failed: ${error.message}`, { cause: error });
  }
  if (error instanceof OpenAI.BadRequestError) {
    return new InvalidRequestError("openai", `Invalid request: ${error.message}`, { cause: error });
  }
  return undefined;
}

export class OpenAIProvider implements Provider {
  readonly id = "openai" as const;
  readonly name = "OpenAI";
  readonly model: string;

  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly maxRetries: number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  private readonly transport: OpenAITransport;
  private readonly agent: Agent | null;
  private tokenizer: Tokenizer | null;
  private closed = false;

  constructor(opts: OpenAIProviderOptions) {
    this.model = opts.model ?? OPENAI_DEFAULT_MODEL;
    this.temperature = opts.temperature ?? 0.7;
    this.maxTokens = opts.maxTokens ?? 1000;
    this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.sleep = opts.sleep;
    this.onRetry = opts.onRetry;
    this.tokenizer = opts.tokenizer === undefined ? loadTokenizer(this.model) : opts.tokenizer;

    if (opts.transport) {
      this.agent = null;
      this.transport = opts.transport;
    } else {
      // SDK retries are off: withRetry owns the policy
      const agent = new Agent({ keepAlive: true });
      const client = new OpenAI({ apiKey: opts.apiKey, maxRetries: 0, httpAgent: agent });
      this.agent = agent;
      this.transport = (request) => client.chat.completions.create(request);
    }
  }

  async chat(messages: ChatMsg[], opts: ChatOptions = {}): Promise<LLMResponse> {
    if (this.closed) {
      throw new ProviderConnectionError(this.id, "provider is closed");
    }

    const request: OpenAICompletionRequest = {
      model: this.model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      temperature: opts.temperature ?? this.temperature,
      max_tokens: opts.maxTokens ?? this.maxTokens,
    };

    return withRetry(
      async () => {
        const res = await this.transport(request);
        const choice = res.choices[0];

        return {
          content: choice?.message.content ?? "",
          inputTokens: res.usage?.prompt_tokens ?? 0,
          outputTokens: res.usage?.completion_tokens ?? 0,
          model: res.model,
          finishReason: choice?.finish_reason ?? undefined,
        };
      },
      {
        provider: this.id,
        maxRetries: this.maxRetries,
        classify: classifyOpenAIError,
        sleep: this.sleep,
        onRetry: this.onRetry,
      }
    );
  }

  countTokens(text: string): number {
    if (!this.tokenizer) return approximateTokens(text);
    try {
      return this.tokenizer.encode(text).length;
    } catch {
      return approximateTokens(text);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.agent?.destroy();
    this.tokenizer?.free();
    this.tokenizer = null;
  }

  toString(): string {
    return `${this.id.toUpperCase()} Provider (model: ${this.model})`;
  }
}
