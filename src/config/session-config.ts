import { URL } from "url";
import { ModelResolutionResult } from "../domain/model-endpoint/services/model-resolution-policy";
import { InvalidConfigError } from "../shared/errors";
import {
  GenerationOptions,
  ModelResolutionSource,
} from "../shared/types/chat";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 11434;
export const REQUEST_TIMEOUT_MS = 60_000;
export const PROBE_TIMEOUT_MS = 2_000;

export interface DaemonEndpoint {
  readonly host: string;
  readonly port: number;
  readonly baseUrl: string;
}

/** Resolved once at startup and passed to every component that needs it. */
export interface SessionConfig {
  readonly model: string;
  readonly modelSource: ModelResolutionSource;
  readonly endpoint: DaemonEndpoint;
  readonly systemPrompt?: string;
  readonly stream: boolean;
  readonly options: Readonly<GenerationOptions>;
  readonly requestTimeoutMs: number;
  readonly probeTimeoutMs: number;
}

export interface SessionConfigInput {
  resolvedModel: ModelResolutionResult;
  endpoint: DaemonEndpoint;
  systemPrompt?: string;
  temperature?: number;
  ctx?: number;
  maxTokens?: number;
  stream?: boolean;
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidConfigError(
      `OLLAMA_PORT must be an integer between 1 and 65535: ${raw}`,
    );
  }
  return port;
}

interface HostSetting {
  protocol: string;
  host: string;
  port?: number;
}

/**
 * Accepts `host`, `host:port` or `http(s)://host[:port]`, the forms the
 * Ollama CLI itself accepts for OLLAMA_HOST.
 */
function parseHostSetting(raw: string): HostSetting {
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(raw) ? raw : `http://${raw}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    throw new InvalidConfigError(`OLLAMA_HOST is not a valid host: ${raw}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidConfigError(
      `OLLAMA_HOST must use http or https: ${raw}`,
    );
  }
  if (!url.hostname || url.pathname !== "/" || url.search || url.username) {
    throw new InvalidConfigError(
      `OLLAMA_HOST must be host, host:port or a scheme://host:port URL: ${raw}`,
    );
  }
  return {
    protocol: url.protocol,
    host: url.hostname,
    port: url.port ? parsePort(url.port) : undefined,
  };
}

/** An explicit OLLAMA_PORT wins over a port given inside OLLAMA_HOST. */
export function resolveDaemonEndpoint(
  env: NodeJS.ProcessEnv = process.env,
): DaemonEndpoint {
  const rawHost = env.OLLAMA_HOST?.trim();
  const setting: HostSetting = rawHost
    ? parseHostSetting(rawHost)
    : { protocol: "http:", host: DEFAULT_HOST };
  const rawPort = env.OLLAMA_PORT?.trim();
  const port = rawPort ? parsePort(rawPort) : (setting.port ?? DEFAULT_PORT);
  return Object.freeze({
    host: setting.host,
    port,
    baseUrl: `${setting.protocol}//${setting.host}:${port}`,
  });
}

export function buildGenerationOptions(input: {
  temperature?: number;
  ctx?: number;
  maxTokens?: number;
}): GenerationOptions {
  const options: GenerationOptions = {};
  if (input.temperature !== undefined) {
    options.temperature = input.temperature;
  }
  if (input.ctx !== undefined) {
    options.num_ctx = input.ctx;
  }
  if (input.maxTokens !== undefined) {
    options.num_predict = input.maxTokens;
  }
  return options;
}

export function buildSessionConfig(input: SessionConfigInput): SessionConfig {
  const systemPrompt = input.systemPrompt?.trim() ? input.systemPrompt : undefined;
  return Object.freeze({
    model: input.resolvedModel.model,
    modelSource: input.resolvedModel.source,
    endpoint: input.endpoint,
    systemPrompt,
    stream: input.stream ?? true,
    options: Object.freeze(buildGenerationOptions(input)),
    requestTimeoutMs: REQUEST_TIMEOUT_MS,
    probeTimeoutMs: PROBE_TIMEOUT_MS,
  });
}
