import { ModelResolutionSource } from "../../../shared/types/chat";

export interface ModelResolutionInput {
  cliModel?: string;
  envModel?: string;
  configModel?: string;
  fallbackModel: string;
}

export interface ModelResolutionResult {
  model: string;
  source: ModelResolutionSource;
}

export function resolveModelByPriority(
  input: ModelResolutionInput,
): ModelResolutionResult {
  if (input.cliModel && input.cliModel.trim().length > 0) {
    return { model: input.cliModel.trim(), source: "cli" };
  }

  if (input.envModel && input.envModel.trim().length > 0) {
    return { model: input.envModel.trim(), source: "env" };
  }

  if (input.configModel && input.configModel.trim().length > 0) {
    return { model: input.configModel.trim(), source: "config" };
  }

  const fallbackModel = input.fallbackModel.trim();
  if (!fallbackModel) {
    throw new Error("Model resolution failed: fallbackModel is empty.");
  }

  return { model: fallbackModel, source: "default" };
}

/**
 * Ollama lists untagged pulls as `<name>:latest`, so `llama3` and
 * `llama3:latest` name the same model.
 */
export function isSameModel(requested: string, listed: string): boolean {
  if (requested === listed) {
    return true;
  }
  return !requested.includes(":") && listed === `${requested}:latest`;
}
