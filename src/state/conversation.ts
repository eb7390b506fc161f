import type { ChatMsg } from "../providers/types.js";

export type Role = ChatMsg["role"];

export interface Message {
  readonly role: Role;
  readonly content: string;
}

export interface ConversationOptions {
  systemPrompt?: string;
  messages?: Message[];
}

/**
 * Ordered, in-memory chat transcript. The order of `messages` is exactly
 * what gets sent to the provider.
 */
export class Conversation {
  readonly systemPrompt?: string;
  private items: Message[];

  constructor(opts: ConversationOptions = {}) {
    this.systemPrompt = opts.systemPrompt || undefined;
    this.items = (opts.messages ?? []).map((m) => freeze(m.role, m.content));

    if (this.systemPrompt && this.items.length === 0) {
      this.addSystem(this.systemPrompt);
    }
  }

  addUser(content: string): void {
    this.items.push(freeze("user", content));
  }

  addAssistant(content: string): void {
    this.items.push(freeze("assistant", content));
  }

  addSystem(content: string): void {
    this.items.push(freeze("system", content));
  }

  get messages(): readonly Message[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  toWire(): ChatMsg[] {
    return this.items.map((m) => ({ role: m.role, content: m.content }));
  }

  // Keeps the configured system prompt, drops everything else
  clear(): void {
    this.items = this.systemPrompt ? [freeze("system", this.systemPrompt)] : [];
  }

  lastUser(): string | undefined {
    return this.lastOf("user");
  }

  lastAssistant(): string | undefined {
    return this.lastOf("assistant");
  }

  toString(): string {
    return `Conversation(${this.items.length} messages)`;
  }

  private lastOf(role: Role): string | undefined {
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (this.items[i].role === role) return this.items[i].content;
    }
    return undefined;
  }
}

function freeze(role: Role, content: string): Message {
  return Object.freeze({ role, content });
}
