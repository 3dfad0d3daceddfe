import { RunChatUseCase } from "../../application/chat/run-chat.usecase";
import { SessionConfig } from "../../config/session-config";
import {
  HELP_TEXT,
  interpretInput,
} from "../../domain/conversation/command-interpreter";
import {
  Conversation,
  TurnMessage,
} from "../../domain/conversation/conversation";
import {
  ChatEventLogEntry,
  ChatEventLogger,
  noopChatEventLogger,
} from "../../operations/logging/chat-event-logger";
import { TranscriptStorePort } from "../../ports/outbound/transcript-store.port";
import {
  ChatClientError,
  UnknownCommandError,
  getErrorMessage,
} from "../../shared/errors";
import { logger } from "../../utils/logger";
import { ErrorPresenter } from "../presenter/error-presenter";

export type ChatSessionState =
  | "awaiting_input"
  | "dispatching"
  | "streaming"
  | "terminated";

export type LineOutcome = "continue" | "terminate";

export interface ChatSessionDeps {
  sessionId: string;
  config: SessionConfig;
  useCase: RunChatUseCase;
  conversation: Conversation;
  transcriptStore: TranscriptStorePort;
  logEvent?: ChatEventLogger;
  presenter?: ErrorPresenter;
  /** Printed before each reply; empty in one-shot mode. */
  replyPrefix?: string;
}

type SessionEvent = Omit<
  ChatEventLogEntry,
  "timestamp" | "session_id" | "model" | "resolution_source"
>;

/**
 * Turn-taking state machine over a single conversation. Only one line is
 * handled at a time; callers serialise input before calling `handleLine`.
 */
export class ChatSession {
  private currentState: ChatSessionState = "awaiting_input";
  private readonly presenter: ErrorPresenter;
  private readonly logEvent: ChatEventLogger;
  private readonly replyPrefix: string;

  constructor(private readonly deps: ChatSessionDeps) {
    this.presenter = deps.presenter ?? new ErrorPresenter();
    this.logEvent = deps.logEvent ?? noopChatEventLogger;
    this.replyPrefix = deps.replyPrefix ?? "Assistant> ";
  }

  get state(): ChatSessionState {
    return this.currentState;
  }

  async start(
    mode: "interactive" | "one_shot",
    pulled: boolean,
  ): Promise<void> {
    if (pulled) {
      await this.safeLog({ event_type: "model_pulled" });
    }
    await this.safeLog({ event_type: "session_start", mode });
  }

  async handleLine(line: string): Promise<LineOutcome> {
    if (this.currentState === "terminated") {
      return "terminate";
    }

    const input = interpretInput(line);
    if (input.kind === "empty") {
      return "continue";
    }

    this.currentState = "dispatching";
    switch (input.kind) {
      case "exit":
        this.currentState = "terminated";
        return "terminate";
      case "help":
        console.log(HELP_TEXT);
        break;
      case "reset":
        this.deps.conversation.reset();
        console.log("History reset.");
        await this.safeLog({
          event_type: "conversation_reset",
          message_count: this.deps.conversation.length,
        });
        break;
      case "save":
        await this.saveTranscript(input.path);
        break;
      case "unknown_command":
        console.error(
          this.presenter.unknownCommand(new UnknownCommandError(input.name)),
        );
        break;
      case "message":
        await this.runTurn(input.content);
        break;
    }

    this.currentState = "awaiting_input";
    return "continue";
  }

  /**
   * Sends the conversation plus `content` and prints the reply as it
   * arrives. The user and assistant messages are committed together, only
   * when the reply completed.
   */
  async runTurn(content: string): Promise<boolean> {
    const { conversation, useCase } = this.deps;
    const userMessage: TurnMessage = { role: "user", content };
    const messages = conversation.withPending(userMessage);
    const startedAt = Date.now();

    this.currentState = "streaming";
    if (this.replyPrefix) {
      process.stdout.write(this.replyPrefix);
    }

    let response = "";
    try {
      if (useCase.streaming) {
        for await (const fragment of useCase.runTurn(messages)) {
          response += fragment;
          process.stdout.write(fragment);
        }
      } else {
        response = await useCase.completeTurn(messages);
        process.stdout.write(response);
      }
      process.stdout.write("\n");
    } catch (error) {
      if (this.replyPrefix || response) {
        process.stdout.write("\n");
      }
      console.error(this.presenter.turnFailed(error));
      await logger.warn(`turn failed: ${getErrorMessage(error)}`);
      await this.safeLog({
        event_type: "turn_failed",
        user_input: content,
        assistant_response: response,
        duration_ms: Date.now() - startedAt,
        error_code: error instanceof ChatClientError ? error.code : undefined,
        error_message: getErrorMessage(error),
      });
      return false;
    } finally {
      this.currentState = "awaiting_input";
    }

    conversation.append(userMessage);
    conversation.append({ role: "assistant", content: response });
    await this.safeLog({
      event_type: "turn_completed",
      user_input: content,
      assistant_response: response,
      duration_ms: Date.now() - startedAt,
    });
    return true;
  }

  async end(): Promise<void> {
    this.currentState = "terminated";
    await this.safeLog({
      event_type: "session_end",
      message_count: this.deps.conversation.length,
    });
  }

  private async saveTranscript(targetPath?: string): Promise<void> {
    const { conversation, config, transcriptStore } = this.deps;
    try {
      const savedPath = await transcriptStore.save(
        conversation.toTranscript(config.model),
        targetPath,
      );
      console.log(`Saved transcript to ${savedPath}`);
      await this.safeLog({
        event_type: "transcript_saved",
        transcript_path: savedPath,
        message_count: conversation.length,
      });
    } catch (error) {
      console.error(`Failed to save transcript: ${getErrorMessage(error)}`);
    }
  }

  private async safeLog(event: SessionEvent): Promise<void> {
    try {
      await this.logEvent({
        ...event,
        timestamp: new Date().toISOString(),
        session_id: this.deps.sessionId,
        model: this.deps.config.model,
        resolution_source: this.deps.config.modelSource,
      });
    } catch (error) {
      await logger.warn(`chat event log failed: ${getErrorMessage(error)}`);
    }
  }
}
