import { Command, InvalidArgumentError } from "commander";
import { randomUUID } from "crypto";
import { RunChatUseCase } from "./application/chat/run-chat.usecase";
import { EnsureModelUseCase } from "./application/model-endpoint/ensure-model.usecase";
import { ResolveModelUseCase } from "./application/model-endpoint/resolve-model.usecase";
import { FileConfigAdapter } from "./adapters/config/file-config.adapter";
import { OllamaCliPullerAdapter } from "./adapters/ollama/ollama-cli-puller.adapter";
import {
  OllamaClientAdapter,
  OllamaClientOptions,
} from "./adapters/ollama/ollama-client.adapter";
import { FileTranscriptStoreAdapter } from "./adapters/transcript/file-transcript-store.adapter";
import {
  buildSessionConfig,
  resolveDaemonEndpoint,
} from "./config/session-config";
import { isSameModel } from "./domain/model-endpoint/services/model-resolution-policy";
import { runChatCommand } from "./interaction/cli/commands/chat.command";
import { ChatEventLogger } from "./operations/logging/chat-event-logger";
import { ConfigPort } from "./ports/outbound/config.port";
import { LlmClientPort } from "./ports/outbound/llm-client.port";
import { ModelPullerPort } from "./ports/outbound/model-puller.port";
import { TranscriptStorePort } from "./ports/outbound/transcript-store.port";
import { getErrorMessage } from "./shared/errors";
import { logger } from "./utils/logger";

interface ChatOptions {
  model?: string;
  system?: string;
  temperature?: number;
  ctx?: number;
  maxTokens?: number;
  stream: boolean;
  prompt?: string;
  logEvents?: boolean;
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer: ${value}`);
  }
  return parsed;
}

export function parseTemperature(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative number: ${value}`);
  }
  return parsed;
}

export function createProgram(deps?: {
  env?: NodeJS.ProcessEnv;
  config?: ConfigPort;
  createLlmClient?: (options: OllamaClientOptions) => LlmClientPort;
  puller?: ModelPullerPort;
  transcriptStore?: TranscriptStorePort;
  logEvent?: ChatEventLogger;
}): Command {
  const env = deps?.env ?? process.env;
  const config = deps?.config ?? new FileConfigAdapter();
  const createLlmClient =
    deps?.createLlmClient ??
    ((options: OllamaClientOptions) => new OllamaClientAdapter(options));
  const puller = deps?.puller ?? new OllamaCliPullerAdapter();
  const transcriptStore =
    deps?.transcriptStore ?? new FileTranscriptStoreAdapter();

  const program = new Command();

  program
    .name("local-llm-chat")
    .description("Terminal chat client for a local Ollama daemon.")
    .version("1.0.0")
    .option("-m, --model <model_name>", "Model name, e.g. smollm2:1.7b")
    .option("-s, --system <prompt>", "Optional system prompt")
    .option(
      "-t, --temperature <value>",
      "Sampling temperature",
      parseTemperature,
    )
    .option(
      "--ctx <n>",
      "Context window size (num_ctx)",
      parsePositiveInteger,
    )
    .option(
      "--max-tokens <n>",
      "Max tokens to generate (num_predict)",
      parsePositiveInteger,
    )
    .option("--no-stream", "Disable streaming output")
    .option("-p, --prompt <text>", "One-shot prompt (non-interactive)")
    .option(
      "--log-events",
      "Enable local chat event logging (masked + rotated)",
    )
    .action(async (options: ChatOptions) => {
      try {
        const endpoint = resolveDaemonEndpoint(env);
        const resolvedModel = await new ResolveModelUseCase(config).execute({
          cliModel: options.model,
          envModel: env.OLLAMA_MODEL,
        });
        const sessionConfig = buildSessionConfig({
          resolvedModel,
          endpoint,
          systemPrompt: options.system,
          temperature: options.temperature,
          ctx: options.ctx,
          maxTokens: options.maxTokens,
          stream: options.stream,
        });
        await logger.info(
          `session config: model=${sessionConfig.model} (${sessionConfig.modelSource}) endpoint=${endpoint.baseUrl} stream=${sessionConfig.stream}`,
        );

        const llmClient = createLlmClient({
          endpoint,
          requestTimeoutMs: sessionConfig.requestTimeoutMs,
          probeTimeoutMs: sessionConfig.probeTimeoutMs,
        });
        await runChatCommand(
          {
            prompt: options.prompt,
            enableEventLog: Boolean(options.logEvents),
          },
          {
            config: sessionConfig,
            useCase: new RunChatUseCase(llmClient, sessionConfig),
            ensureModel: new EnsureModelUseCase(llmClient, puller),
            transcriptStore,
            createSessionId: () => `session-${randomUUID()}`,
            logEvent: deps?.logEvent,
          },
        );
      } catch (error) {
        console.error(`Failed to start chat: ${getErrorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  const modelCommand = program
    .command("model")
    .description("Model operations.");

  modelCommand
    .command("list")
    .description("List models installed in the Ollama daemon.")
    .action(async () => {
      try {
        const models = await createLlmClient({
          endpoint: resolveDaemonEndpoint(env),
        }).listModels();
        if (models.length === 0) {
          console.log("No models installed.");
          return;
        }
        console.log("Installed models:");
        models.forEach((m) => console.log(`  - ${m.name}`));
      } catch (error) {
        console.error(`Failed to list models: ${getErrorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  modelCommand
    .command("use <model_name>")
    .description("Set the default model.")
    .action(async (modelName: string) => {
      try {
        const models = await createLlmClient({
          endpoint: resolveDaemonEndpoint(env),
        }).listModels();
        if (!models.some((m) => isSameModel(modelName, m.name))) {
          console.error(`Error: model '${modelName}' is not installed.`);
          process.exitCode = 1;
          return;
        }
        await config.setDefaultModel(modelName);
        console.log(`Default model set to '${modelName}'.`);
      } catch (error) {
        console.error(`Failed to set default model: ${getErrorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
