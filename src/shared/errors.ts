export type ChatClientErrorCode =
  | "TRANSPORT_UNAVAILABLE"
  | "MODEL_NOT_FOUND"
  | "REQUEST_REJECTED"
  | "PROTOCOL_DECODE"
  | "MODEL_UNAVAILABLE"
  | "UNKNOWN_COMMAND"
  | "INVALID_MESSAGE"
  | "INVALID_CONFIG";

export class ChatClientError extends Error {
  constructor(
    readonly code: ChatClientErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ChatClientError";
  }
}

export class TransportUnavailableError extends ChatClientError {
  constructor(
    readonly baseUrl: string,
    detail: string,
  ) {
    super("TRANSPORT_UNAVAILABLE", `Cannot reach Ollama at ${baseUrl}: ${detail}`);
    this.name = "TransportUnavailableError";
  }
}

export class ModelNotFoundError extends ChatClientError {
  constructor(
    readonly model: string,
    detail?: string,
  ) {
    super(
      "MODEL_NOT_FOUND",
      detail
        ? `Model '${model}' was not found: ${detail}`
        : `Model '${model}' was not found.`,
    );
    this.name = "ModelNotFoundError";
  }
}

export class RequestRejectedError extends ChatClientError {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super("REQUEST_REJECTED", message);
    this.name = "RequestRejectedError";
  }
}

export class ProtocolDecodeError extends ChatClientError {
  constructor(message: string) {
    super("PROTOCOL_DECODE", message);
    this.name = "ProtocolDecodeError";
  }
}

export class ModelUnavailableError extends ChatClientError {
  constructor(
    readonly model: string,
    message: string,
  ) {
    super("MODEL_UNAVAILABLE", message);
    this.name = "ModelUnavailableError";
  }
}

export class UnknownCommandError extends ChatClientError {
  constructor(readonly command: string) {
    super("UNKNOWN_COMMAND", `Unknown command: ${command}`);
    this.name = "UnknownCommandError";
  }
}

export class InvalidMessageError extends ChatClientError {
  constructor(message: string) {
    super("INVALID_MESSAGE", message);
    this.name = "InvalidMessageError";
  }
}

export class InvalidConfigError extends ChatClientError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
    this.name = "InvalidConfigError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
