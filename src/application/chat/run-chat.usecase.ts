import { SessionConfig } from "../../config/session-config";
import { LlmClientPort } from "../../ports/outbound/llm-client.port";
import { ChatMessage, ChatRequest } from "../../shared/types/chat";

export class RunChatUseCase {
  constructor(
    private readonly llmClient: LlmClientPort,
    private readonly config: SessionConfig,
  ) {}

  get streaming(): boolean {
    return this.config.stream;
  }

  /** Yields non-empty fragments as the daemon emits them. */
  async *runTurn(messages: readonly ChatMessage[]): AsyncGenerator<string> {
    for await (const chunk of this.llmClient.chat(this.buildRequest(messages))) {
      if (chunk.content) {
        yield chunk.content;
      }
      if (chunk.done) {
        return;
      }
    }
  }

  async completeTurn(messages: readonly ChatMessage[]): Promise<string> {
    return this.llmClient.complete(this.buildRequest(messages));
  }

  private buildRequest(messages: readonly ChatMessage[]): ChatRequest {
    return {
      model: this.config.model,
      messages,
      options: this.config.options,
    };
  }
}
