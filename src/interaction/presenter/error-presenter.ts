import { EnsureModelFailure } from "../../application/model-endpoint/ensure-model.usecase";
import {
  ChatClientError,
  UnknownCommandError,
  getErrorMessage,
} from "../../shared/errors";

export class ErrorPresenter {
  daemonUnreachable(baseUrl: string): string {
    return [
      `Cannot reach Ollama at ${baseUrl}. Is the daemon running?`,
      "Start it with: ollama serve",
    ].join("\n");
  }

  modelUnavailable(failure: EnsureModelFailure): string {
    const candidates =
      failure.candidates.length > 0
        ? failure.candidates.join(", ")
        : "(no models available)";
    const lines: string[] = [];
    switch (failure.reason) {
      case "puller_unavailable":
        lines.push(
          `Model '${failure.model}' is not installed and the 'ollama' CLI was not found in PATH.`,
          "Install Ollama from https://ollama.com, then run:",
        );
        break;
      case "pull_failed":
        lines.push(
          `Failed to pull model '${failure.model}' via the ollama CLI. You can pull manually:`,
        );
        break;
      default:
        lines.push(
          `Model '${failure.model}' is still not listed by the daemon after pulling. Try:`,
        );
        break;
    }
    lines.push(`  ollama pull ${failure.model}`, `Installed models: ${candidates}`);
    return lines.join("\n");
  }

  bootstrapFailure(failure: EnsureModelFailure, baseUrl: string): string {
    return failure.code === "DAEMON_UNREACHABLE"
      ? this.daemonUnreachable(baseUrl)
      : this.modelUnavailable(failure);
  }

  unknownCommand(error: UnknownCommandError): string {
    return `${error.message} (type /help for commands)`;
  }

  turnFailed(error: unknown): string {
    if (error instanceof ChatClientError) {
      return `Error [${error.code}]: ${error.message}`;
    }
    return `Error: ${getErrorMessage(error)}`;
  }
}
