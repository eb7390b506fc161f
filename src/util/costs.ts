import { get_encoding, type Tiktoken, type TiktokenEncoding } from "tiktoken";
import { encodingFor } from "../providers/openai.js";
import { approximateTokens } from "../providers/types.js";

export interface ModelPricing {
  inputPerMillion: number;
  outputPerMillion: number;
}

// USD per 1M tokens
export const PRICING: Readonly<Record<string, ModelPricing>> = {
  "gpt-4o-mini": { inputPerMillion: 0.15, outputPerMillion: 0.6 },
  "gpt-4o": { inputPerMillion: 2.5, outputPerMillion: 10.0 },
  "claude-3-5-haiku-20241022": { inputPerMillion: 0.8, outputPerMillion: 4.0 },
  "claude-3-5-sonnet-20241022": { inputPerMillion: 3.0, outputPerMillion: 15.0 },
};

export const DEFAULT_PRICING_MODEL = "gpt-4o-mini";

export interface CostEntry {
  readonly provider: string;
  readonly model: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cost: number;
}

export interface CostThresholds {
  warningThreshold?: number;
  limitThreshold?: number;
}

// Ids missing from the table, dated snapshots included, bill at the default rate
export function resolvePricing(model: string): ModelPricing {
  return PRICING[model] ?? PRICING[DEFAULT_PRICING_MODEL];
}

export function formatEntry(entry: CostEntry): string {
  return `${entry.provider}/${entry.model}: ${entry.inputTokens}→${entry.outputTokens} tokens, $${entry.cost.toFixed(6)}`;
}

/**
 * Append-only record of what the session has spent, checked against a
 * warning threshold and a hard limit (both USD).
 */
export class CostLedger {
  readonly warningThreshold: number;
  readonly limitThreshold: number;
  private items: CostEntry[] = [];

  constructor(thresholds: CostThresholds = {}) {
    this.warningThreshold = thresholds.warningThreshold ?? 0.1;
    this.limitThreshold = thresholds.limitThreshold ?? 1.0;
  }

  static calculateCost(model: string, inputTokens: number, outputTokens: number): number {
    const pricing = resolvePricing(model);
    const inputCost = (inputTokens / 1_000_000) * pricing.inputPerMillion;
    const outputCost = (outputTokens / 1_000_000) * pricing.outputPerMillion;
    return inputCost + outputCost;
  }

  record(provider: string, model: string, inputTokens: number, outputTokens: number): number {
    const cost = CostLedger.calculateCost(model, inputTokens, outputTokens);
    this.items.push(Object.freeze({ provider, model, inputTokens, outputTokens, cost }));
    return cost;
  }

  get entries(): readonly CostEntry[] {
    return this.items;
  }

  totalCost(): number {
    return this.items.reduce((total, entry) => total + entry.cost, 0);
  }

  totalTokens(): { input: number; output: number } {
    return this.items.reduce(
      (totals, entry) => ({
        input: totals.input + entry.inputTokens,
        output: totals.output + entry.outputTokens,
      }),
      { input: 0, output: 0 }
    );
  }

  shouldWarn(): boolean {
    return this.totalCost() >= this.warningThreshold;
  }

  shouldStop(): boolean {
    return this.totalCost() >= this.limitThreshold;
  }

  reset(): void {
    this.items = [];
  }

  summary(): string {
    const totalCost = this.totalCost();
    const tokens = this.totalTokens();
    const rule = "=".repeat(60);

    const lines = [
      rule,
      "💰 SESSION COST SUMMARY",
      rule,
      `Total API Calls: ${this.items.length}`,
      `Total Tokens: ${tokens.input.toLocaleString("en-US")} input → ${tokens.output.toLocaleString("en-US")} output`,
      `Total Cost: $${totalCost.toFixed(6)}`,
      "",
      `Warning Threshold: $${this.warningThreshold.toFixed(2)}`,
      `Limit Threshold: $${this.limitThreshold.toFixed(2)}`,
    ];

    if (this.shouldStop()) {
      lines.push(`\n⚠️  LIMIT EXCEEDED! Cost has reached $${totalCost.toFixed(6)}`);
    } else if (this.shouldWarn()) {
      lines.push(`\n⚠️  Warning: Cost is $${totalCost.toFixed(6)}`);
    }
    lines.push(rule);

    return lines.join("\n");
  }

  toString(): string {
    return `CostLedger(${this.items.length} calls, $${this.totalCost().toFixed(6)})`;
  }
}

const encoders = new Map<TiktokenEncoding, Tiktoken>();

function encoderFor(model: string): Tiktoken {
  const name = encodingFor(model);
  let enc = encoders.get(name);
  if (!enc) {
    enc = get_encoding(name);
    encoders.set(name, enc);
  }
  return enc;
}

/** Token estimate for budgeting before a call; GPT models go through tiktoken. */
export function estimateTokens(text: string, model: string = DEFAULT_PRICING_MODEL): number {
  if (!model.toLowerCase().includes("gpt")) {
    return approximateTokens(text);
  }
  try {
    return encoderFor(model).encode(text).length;
  } catch {
    return approximateTokens(text);
  }
}
