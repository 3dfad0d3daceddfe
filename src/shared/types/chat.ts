export type ChatRole = "user" | "assistant" | "system";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatChunk {
  content: string;
  done: boolean;
}

/** Generation parameters forwarded as the daemon's `options` object. */
export interface GenerationOptions {
  temperature?: number;
  num_ctx?: number;
  num_predict?: number;
}

export interface ChatRequest {
  model: string;
  messages: readonly ChatMessage[];
  options?: GenerationOptions;
}

export type ModelResolutionSource = "cli" | "env" | "config" | "default";
