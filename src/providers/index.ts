import { ConfigurationError } from "../error/errors.js";
import { ANTHROPIC_DEFAULT_MODEL, AnthropicProvider } from "./anthropic.js";
import { OPENAI_DEFAULT_MODEL, OpenAIProvider } from "./openai.js";
import { PROVIDERS, type Provider, type ProviderId, type ProviderOptions } from "./types.js";

export const DEFAULT_MODELS: Record<ProviderId, string> = {
  openai: OPENAI_DEFAULT_MODEL,
  anthropic: ANTHROPIC_DEFAULT_MODEL,
};

const registry: Record<ProviderId, (opts: ProviderOptions) => Provider> = {
  openai: (opts) => new OpenAIProvider(opts),
  anthropic: (opts) => new AnthropicProvider(opts),
};

export function isProviderId(value: string): value is ProviderId {
  return PROVIDERS.some((id) => id === value);
}

export function createProvider(id: string, opts: ProviderOptions): Provider {
  if (!isProviderId(id)) {
    throw new ConfigurationError(`Unknown provider: ${id}. Available: ${PROVIDERS.join(", ")}`);
  }
  return registry[id]({ model: DEFAULT_MODELS[id], ...opts });
}

// Re-export types
export * from "./types.js";
