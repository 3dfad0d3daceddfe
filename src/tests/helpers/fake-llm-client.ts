import {
  LlmClientPort,
  ModelSummary,
} from "../../ports/outbound/llm-client.port";
import {
  ModelPullerPort,
  PullOutcome,
} from "../../ports/outbound/model-puller.port";
import { ChatChunk, ChatMessage, ChatRequest } from "../../shared/types/chat";

export interface FakeLlmScript {
  models?: ModelSummary[];
  versionError?: Error;
  chunks?: ChatChunk[];
  /** Thrown after every scripted chunk has been yielded. */
  streamError?: Error;
}

export class FakeLlmClient implements LlmClientPort {
  readonly requests: ChatRequest[] = [];
  models: ModelSummary[];

  constructor(private readonly script: FakeLlmScript = {}) {
    this.models = script.models ?? [];
  }

  async getVersion(): Promise<string> {
    if (this.script.versionError) {
      throw this.script.versionError;
    }
    return "0.0.0-test";
  }

  async listModels(): Promise<ModelSummary[]> {
    return [...this.models];
  }

  async *chat(request: ChatRequest): AsyncGenerator<ChatChunk> {
    this.record(request);
    for (const chunk of this.script.chunks ?? []) {
      yield chunk;
    }
    if (this.script.streamError) {
      throw this.script.streamError;
    }
  }

  async complete(request: ChatRequest): Promise<string> {
    this.record(request);
    if (this.script.streamError) {
      throw this.script.streamError;
    }
    return (this.script.chunks ?? []).map((c) => c.content).join("");
  }

  lastMessages(): ChatMessage[] {
    const last = this.requests[this.requests.length - 1];
    return last ? [...last.messages] : [];
  }

  private record(request: ChatRequest): void {
    this.requests.push({
      ...request,
      messages: request.messages.map((m) => ({ ...m })),
    });
  }
}

export class FakePuller implements ModelPullerPort {
  readonly pulled: string[] = [];

  constructor(
    private readonly outcome: PullOutcome,
    private readonly onPull?: (model: string) => void,
  ) {}

  async pull(model: string): Promise<PullOutcome> {
    this.pulled.push(model);
    if (this.outcome === "pulled") {
      this.onPull?.(model);
    }
    return this.outcome;
  }
}

export function fragments(...texts: string[]): ChatChunk[] {
  return [
    ...texts.map((content) => ({ content, done: false })),
    { content: "", done: true },
  ];
}
