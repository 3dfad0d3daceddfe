import * as readline from "readline";
import { RunChatUseCase } from "../../../application/chat/run-chat.usecase";
import { EnsureModelUseCase } from "../../../application/model-endpoint/ensure-model.usecase";
import { SessionConfig } from "../../../config/session-config";
import { Conversation } from "../../../domain/conversation/conversation";
import {
  ChatEventLogger,
  createChatEventLogger,
  noopChatEventLogger,
} from "../../../operations/logging/chat-event-logger";
import { TranscriptStorePort } from "../../../ports/outbound/transcript-store.port";
import { ErrorPresenter } from "../../presenter/error-presenter";
import { ChatSession } from "../chat-session";

interface ChatCommandInput {
  prompt?: string;
  enableEventLog?: boolean;
}

interface ChatCommandDeps {
  config: SessionConfig;
  useCase: RunChatUseCase;
  ensureModel: EnsureModelUseCase;
  transcriptStore: TranscriptStorePort;
  createSessionId: () => string;
  logEvent?: ChatEventLogger;
}

export async function runChatCommand(
  input: ChatCommandInput,
  deps: ChatCommandDeps,
): Promise<void> {
  const errorPresenter = new ErrorPresenter();
  const logEvent: ChatEventLogger = input.enableEventLog
    ? (deps.logEvent ?? createChatEventLogger())
    : noopChatEventLogger;
  const { config } = deps;

  const bootstrap = await deps.ensureModel.execute(config.model);
  if (!bootstrap.ok) {
    console.error(
      errorPresenter.bootstrapFailure(bootstrap, config.endpoint.baseUrl),
    );
    process.exitCode = 1;
    return;
  }

  const oneShot = Boolean(input.prompt);
  const session = new ChatSession({
    sessionId: deps.createSessionId(),
    config,
    useCase: deps.useCase,
    conversation: new Conversation(config.systemPrompt),
    transcriptStore: deps.transcriptStore,
    logEvent,
    presenter: errorPresenter,
    replyPrefix: oneShot ? "" : "Assistant> ",
  });
  await session.start(oneShot ? "one_shot" : "interactive", bootstrap.pulled);

  if (input.prompt) {
    const ok = await session.runTurn(input.prompt);
    await session.end();
    if (!ok) {
      process.exitCode = 1;
    }
    return;
  }

  console.log(`Model: ${config.model}`);
  console.log("Type '/help' for commands. Start chatting.\n");

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "You> ",
  });

  rl.prompt();
  let closed = false;
  let lineQueue = Promise.resolve();

  const handleLine = async (line: string): Promise<void> => {
    const outcome = await session.handleLine(line);
    if (outcome === "terminate") {
      if (!closed) {
        rl.close();
      }
      return;
    }
    rl.prompt();
  };

  rl.on("line", (line) => {
    lineQueue = lineQueue
      .then(() => handleLine(line))
      .catch((error: unknown) => {
        console.error(errorPresenter.turnFailed(error));
        rl.prompt();
      });
  })
    .on("SIGINT", () => {
      rl.close();
    })
    .on("close", () => {
      closed = true;
      lineQueue = lineQueue
        .then(() => session.end())
        .then(() => {
          console.log("Exiting.");
        })
        .catch((error: unknown) => {
          console.error(errorPresenter.turnFailed(error));
        });
    });
}
