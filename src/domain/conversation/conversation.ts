import { InvalidMessageError } from "../../shared/errors";
import { ChatMessage } from "../../shared/types/chat";

export type TurnMessage = ChatMessage & { role: "user" | "assistant" };

export interface Transcript {
  model: string;
  history: ChatMessage[];
}

/**
 * Ordered dialogue history. A system message, when present, is fixed at
 * index 0 and survives `reset()`; everything after it is append-only.
 */
export class Conversation {
  private readonly system?: Readonly<ChatMessage>;
  private turns: Readonly<ChatMessage>[] = [];

  constructor(systemPrompt?: string) {
    if (systemPrompt) {
      this.system = Object.freeze({ role: "system", content: systemPrompt });
    }
  }

  get systemPrompt(): string | undefined {
    return this.system?.content;
  }

  get messages(): readonly ChatMessage[] {
    return this.system ? [this.system, ...this.turns] : [...this.turns];
  }

  get length(): number {
    return this.turns.length + (this.system ? 1 : 0);
  }

  append(message: TurnMessage): void {
    const role: string = message.role;
    if (role !== "user" && role !== "assistant") {
      throw new InvalidMessageError(
        `Only user and assistant messages can be appended, got '${role}'.`,
      );
    }
    this.turns.push(Object.freeze({ role: message.role, content: message.content }));
  }

  /** Messages to send for a turn whose user message is not yet committed. */
  withPending(message: TurnMessage): ChatMessage[] {
    return [...this.messages, { role: message.role, content: message.content }];
  }

  reset(): void {
    this.turns = [];
  }

  toTranscript(model: string): Transcript {
    return {
      model,
      history: this.messages.map((m) => ({ role: m.role, content: m.content })),
    };
  }
}
