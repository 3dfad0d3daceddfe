import { ChatChunk, ChatRequest } from "../../shared/types/chat";

export interface ModelSummary {
  name: string;
}

export interface LlmClientPort {
  getVersion(): Promise<string>;
  listModels(): Promise<ModelSummary[]>;
  /** Streams decoded chunks; returns after the chunk flagged `done`. */
  chat(request: ChatRequest): AsyncGenerator<ChatChunk>;
  complete(request: ChatRequest): Promise<string>;
}
