export type ChatMsg = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type ProviderId = "openai" | "anthropic";

export const PROVIDERS: readonly ProviderId[] = ["openai", "anthropic"];

export interface LLMResponse {
  content: string;
  inputTokens: number;
  outputTokens: number;
  model: string;
  finishReason?: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface Provider {
  readonly id: ProviderId;
  readonly name: string;
  readonly model: string;

  // Chat completion, retried on transient failures
  chat(messages: ChatMsg[], opts?: ChatOptions): Promise<LLMResponse>;

  // Local estimate only, not billing-grade
  countTokens(text: string): number;

  // Releases the HTTP agent; safe to call more than once
  close(): Promise<void>;
}

export interface ProviderOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export function describeResponse(res: LLMResponse): string {
  return `LLMResponse(tokens: ${res.inputTokens}→${res.outputTokens}, model: ${res.model})`;
}

export function approximateTokens(text: string): number {
  // Code points, so astral characters such as emoji count once
  return Math.floor([...text].length / 4);
}
