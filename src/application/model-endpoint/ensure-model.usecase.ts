import { isSameModel } from "../../domain/model-endpoint/services/model-resolution-policy";
import {
  LlmClientPort,
  ModelSummary,
} from "../../ports/outbound/llm-client.port";
import { ModelPullerPort } from "../../ports/outbound/model-puller.port";
import { getErrorMessage } from "../../shared/errors";
import { logger } from "../../utils/logger";

export interface EnsureModelSuccess {
  ok: true;
  model: string;
  pulled: boolean;
}

export interface EnsureModelFailure {
  ok: false;
  code: "DAEMON_UNREACHABLE" | "MODEL_UNAVAILABLE";
  model: string;
  reason:
    | "daemon_unreachable"
    | "puller_unavailable"
    | "pull_failed"
    | "not_listed_after_pull";
  detail?: string;
  candidates: string[];
}

export type EnsureModelResult = EnsureModelSuccess | EnsureModelFailure;

function hasModel(models: ModelSummary[], model: string): boolean {
  return models.some((m) => isSameModel(model, m.name));
}

/** Probes the daemon and pulls the model once if it is not installed. */
export class EnsureModelUseCase {
  constructor(
    private readonly llmClient: LlmClientPort,
    private readonly puller: ModelPullerPort,
  ) {}

  async execute(model: string): Promise<EnsureModelResult> {
    try {
      const version = await this.llmClient.getVersion();
      await logger.info(`ollama daemon reachable (version ${version})`);
    } catch (error) {
      return {
        ok: false,
        code: "DAEMON_UNREACHABLE",
        model,
        reason: "daemon_unreachable",
        detail: getErrorMessage(error),
        candidates: [],
      };
    }

    const installed = await this.llmClient.listModels();
    if (hasModel(installed, model)) {
      return { ok: true, model, pulled: false };
    }

    const candidates = installed.map((m) => m.name);
    const outcome = await this.puller.pull(model);
    if (outcome === "unavailable") {
      return {
        ok: false,
        code: "MODEL_UNAVAILABLE",
        model,
        reason: "puller_unavailable",
        candidates,
      };
    }
    if (outcome === "failed") {
      return {
        ok: false,
        code: "MODEL_UNAVAILABLE",
        model,
        reason: "pull_failed",
        candidates,
      };
    }

    const afterPull = await this.llmClient.listModels();
    if (!hasModel(afterPull, model)) {
      return {
        ok: false,
        code: "MODEL_UNAVAILABLE",
        model,
        reason: "not_listed_after_pull",
        candidates: afterPull.map((m) => m.name),
      };
    }
    return { ok: true, model, pulled: true };
  }
}
