import { spawn, StdioOptions } from "child_process";
import {
  ModelPullerPort,
  PullOutcome,
} from "../../ports/outbound/model-puller.port";
import { logger } from "../../utils/logger";

export interface OllamaCliPullerOptions {
  command?: string;
  /** Arguments placed before `pull <model>`. */
  baseArgs?: string[];
  /** `inherit` lets the CLI draw its own progress bar. */
  stdio?: StdioOptions;
}

/** Pulls models by running `ollama pull <model>`. */
export class OllamaCliPullerAdapter implements ModelPullerPort {
  private readonly command: string;
  private readonly baseArgs: string[];
  private readonly stdio: StdioOptions;

  constructor(options: OllamaCliPullerOptions = {}) {
    this.command = options.command ?? "ollama";
    this.baseArgs = options.baseArgs ?? [];
    this.stdio = options.stdio ?? "inherit";
  }

  async pull(model: string): Promise<PullOutcome> {
    const args = [...this.baseArgs, "pull", model];
    await logger.info(`spawning ${this.command} ${args.join(" ")}`);

    const outcome = await new Promise<PullOutcome>((resolve, reject) => {
      const child = spawn(this.command, args, { stdio: this.stdio });
      child.once("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT" || error.code === "EACCES") {
          resolve("unavailable");
          return;
        }
        reject(error);
      });
      child.once("close", (code) => {
        resolve(code === 0 ? "pulled" : "failed");
      });
    });

    await logger.info(`pull ${model}: ${outcome}`);
    return outcome;
  }
}
