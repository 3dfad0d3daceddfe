import {
  ModelResolutionResult,
  resolveModelByPriority,
} from "../../domain/model-endpoint/services/model-resolution-policy";
import { ConfigPort } from "../../ports/outbound/config.port";

export const FALLBACK_MODEL = "smollm2:1.7b";

export interface ResolveModelInput {
  cliModel?: string;
  envModel?: string;
}

export class ResolveModelUseCase {
  constructor(
    private readonly config: ConfigPort,
    private readonly fallbackModel: string = FALLBACK_MODEL,
  ) {}

  async execute(input: ResolveModelInput): Promise<ModelResolutionResult> {
    const configModel = await this.config.getDefaultModel();

    return resolveModelByPriority({
      cliModel: input.cliModel,
      envModel: input.envModel,
      configModel,
      fallbackModel: this.fallbackModel,
    });
  }
}
