import axios, { AxiosInstance } from "axios";
import { TextDecoder } from "util";
import {
  DaemonEndpoint,
  PROBE_TIMEOUT_MS,
  REQUEST_TIMEOUT_MS,
} from "../../config/session-config";
import {
  LlmClientPort,
  ModelSummary,
} from "../../ports/outbound/llm-client.port";
import {
  ChatClientError,
  ModelNotFoundError,
  ProtocolDecodeError,
  RequestRejectedError,
  TransportUnavailableError,
  getErrorMessage,
} from "../../shared/errors";
import {
  ChatChunk,
  ChatMessage,
  ChatRequest,
  GenerationOptions,
} from "../../shared/types/chat";
import { logger } from "../../utils/logger";

interface OllamaChatBody {
  model: string;
  messages: ChatMessage[];
  stream: boolean;
  options?: GenerationOptions;
}

export interface OllamaClientOptions {
  endpoint: DaemonEndpoint;
  requestTimeoutMs?: number;
  probeTimeoutMs?: number;
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "ECONNABORTED",
  "EPIPE",
  "ERR_NETWORK",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return (
    typeof value === "object" && value !== null && Symbol.asyncIterator in value
  );
}

function preview(text: string, maxChars = 120): string {
  const compact = text.trim();
  return compact.length > maxChars ? `${compact.slice(0, maxChars)}...` : compact;
}

function decodePiece(decoder: TextDecoder, piece: unknown): string {
  if (typeof piece === "string") {
    return piece;
  }
  if (piece instanceof Uint8Array) {
    return decoder.decode(piece, { stream: true });
  }
  throw new ProtocolDecodeError("Ollama stream produced a non-binary chunk.");
}

/**
 * Validates one decoded daemon object. An `error` field is never guessed
 * at: it is reported as a decode failure of the turn.
 */
export function toChatChunk(value: unknown): ChatChunk {
  if (!isRecord(value)) {
    throw new ProtocolDecodeError("Ollama chunk is not a JSON object.");
  }
  if (value.error !== undefined) {
    throw new ProtocolDecodeError(
      `Ollama reported an error in the response body: ${String(value.error)}`,
    );
  }
  if (typeof value.done !== "boolean") {
    throw new ProtocolDecodeError("Ollama chunk is missing the 'done' flag.");
  }

  const message = value.message;
  if (message === undefined) {
    return { content: "", done: value.done };
  }
  if (!isRecord(message)) {
    throw new ProtocolDecodeError("Ollama chunk carries a malformed 'message'.");
  }
  const content = message.content ?? "";
  if (typeof content !== "string") {
    throw new ProtocolDecodeError("Ollama chunk content is not a string.");
  }
  return { content, done: value.done };
}

export function decodeChunkLine(line: string): ChatChunk {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new ProtocolDecodeError(
      `Failed to parse Ollama JSON chunk: ${preview(line)}`,
    );
  }
  return toChatChunk(parsed);
}

function extractErrorText(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed) && typeof parsed.error === "string") {
      return parsed.error;
    }
  } catch {
    return text.trim();
  }
  return text.trim();
}

async function readErrorDetail(data: unknown): Promise<string> {
  if (typeof data === "string") {
    return extractErrorText(data);
  }
  if (isRecord(data) && typeof data.error === "string") {
    return data.error;
  }
  if (isAsyncIterable(data)) {
    const decoder = new TextDecoder("utf-8");
    let text = "";
    for await (const piece of data) {
      text += decodePiece(decoder, piece);
    }
    return extractErrorText(text + decoder.decode());
  }
  return "";
}

function describeNetworkFailure(code: string | undefined, message: string): string {
  switch (code) {
    case "ECONNREFUSED":
      return "connection refused. Is the daemon running?";
    case "ECONNABORTED":
    case "ETIMEDOUT":
      return "the request timed out.";
    case "ENOTFOUND":
    case "EAI_AGAIN":
      return "the host name could not be resolved.";
    default:
      return message;
  }
}

function assertChatRequest(request: ChatRequest): void {
  if (!request.model.trim()) {
    throw new RequestRejectedError("A model name is required.");
  }
  if (request.messages.length === 0) {
    throw new RequestRejectedError("At least one message is required.");
  }
}

export class OllamaClientAdapter implements LlmClientPort {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly probeTimeoutMs: number;

  constructor(options: OllamaClientOptions) {
    this.baseUrl = options.endpoint.baseUrl;
    this.probeTimeoutMs = options.probeTimeoutMs ?? PROBE_TIMEOUT_MS;
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS,
      headers: { "Content-Type": "application/json" },
    });
  }

  async getVersion(): Promise<string> {
    try {
      const response = await this.http.get<unknown>("/api/version", {
        timeout: this.probeTimeoutMs,
      });
      const data = response.data;
      if (!isRecord(data) || typeof data.version !== "string") {
        throw new ProtocolDecodeError("Unexpected /api/version response.");
      }
      return data.version;
    } catch (error) {
      throw await this.toClientError(error);
    }
  }

  async listModels(): Promise<ModelSummary[]> {
    try {
      const response = await this.http.get<unknown>("/api/tags");
      const data = response.data;
      if (!isRecord(data) || !Array.isArray(data.models)) {
        throw new ProtocolDecodeError("Unexpected /api/tags response.");
      }
      const models: unknown[] = data.models;
      return models.flatMap((m) =>
        isRecord(m) && typeof m.name === "string" ? [{ name: m.name }] : [],
      );
    } catch (error) {
      throw await this.toClientError(error);
    }
  }

  async *chat(request: ChatRequest): AsyncGenerator<ChatChunk> {
    assertChatRequest(request);
    await logger.debug(
      `chat stream: model=${request.model} messages=${request.messages.length}`,
    );

    let stream: AsyncIterable<unknown>;
    try {
      const response = await this.http.post<unknown>(
        "/api/chat",
        this.buildBody(request, true),
        { responseType: "stream" },
      );
      if (!isAsyncIterable(response.data)) {
        throw new ProtocolDecodeError("Ollama did not return a stream.");
      }
      stream = response.data;
    } catch (error) {
      throw await this.toClientError(error, request.model);
    }

    const decoder = new TextDecoder("utf-8");
    let buffer = "";
    try {
      for await (const piece of stream) {
        buffer += decodePiece(decoder, piece);
        const lines = buffer.split("\n");
        buffer = lines.pop() ?? "";

        for (const line of lines) {
          if (!line.trim()) {
            continue;
          }
          const chunk = decodeChunkLine(line);
          yield chunk;
          if (chunk.done) {
            return;
          }
        }
      }
      buffer += decoder.decode();
    } catch (error) {
      const mapped = await this.toClientError(error, request.model);
      if (mapped instanceof ChatClientError) {
        throw mapped;
      }
      await logger.warn(`chat stream interrupted: ${mapped.message}`);
      throw new TransportUnavailableError(
        this.baseUrl,
        "the connection closed mid-response.",
      );
    }

    if (buffer.trim()) {
      const chunk = decodeChunkLine(buffer);
      yield chunk;
      if (chunk.done) {
        return;
      }
    }
    throw new ProtocolDecodeError(
      "Ollama stream ended before the final chunk.",
    );
  }

  async complete(request: ChatRequest): Promise<string> {
    assertChatRequest(request);
    await logger.debug(
      `chat: model=${request.model} messages=${request.messages.length}`,
    );

    try {
      const response = await this.http.post<unknown>(
        "/api/chat",
        this.buildBody(request, false),
      );
      const chunk = toChatChunk(response.data);
      if (!chunk.done) {
        throw new ProtocolDecodeError(
          "Ollama returned an incomplete non-streaming response.",
        );
      }
      return chunk.content;
    } catch (error) {
      throw await this.toClientError(error, request.model);
    }
  }

  private buildBody(request: ChatRequest, stream: boolean): OllamaChatBody {
    const body: OllamaChatBody = {
      model: request.model,
      messages: request.messages.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      stream,
    };
    if (request.options && Object.keys(request.options).length > 0) {
      body.options = { ...request.options };
    }
    return body;
  }

  private async toClientError(error: unknown, model?: string): Promise<Error> {
    if (error instanceof ChatClientError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        const detail = await readErrorDetail(error.response.data).catch(
          (readError: unknown) => getErrorMessage(readError),
        );
        if (model && (status === 404 || /not found/i.test(detail))) {
          return new ModelNotFoundError(model, detail || undefined);
        }
        return new RequestRejectedError(
          `Ollama API error (${status}): ${detail || error.response.statusText || error.message}`,
          status,
        );
      }
      await logger.warn(`network error: ${error.code ?? "unknown"} ${error.message}`);
      return new TransportUnavailableError(
        this.baseUrl,
        describeNetworkFailure(error.code, error.message),
      );
    }

    if (error instanceof Error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
        return new TransportUnavailableError(
          this.baseUrl,
          describeNetworkFailure(code, error.message),
        );
      }
      if (error.message === "aborted") {
        return new TransportUnavailableError(
          this.baseUrl,
          "the connection closed mid-response.",
        );
      }
      return error;
    }
    return new Error(String(error));
  }
}
