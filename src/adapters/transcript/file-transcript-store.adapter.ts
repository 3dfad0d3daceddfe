import { promises as fsp } from "fs";
import * as path from "path";
import { Transcript } from "../../domain/conversation/conversation";
import { TranscriptStorePort } from "../../ports/outbound/transcript-store.port";
import { logger } from "../../utils/logger";

export function defaultTranscriptPath(now: Date = new Date()): string {
  return `chat_${Math.floor(now.getTime() / 1000)}.json`;
}

export interface FileTranscriptStoreOptions {
  /** Base for relative paths; the working directory by default. */
  directory?: string;
  now?: () => Date;
}

export class FileTranscriptStoreAdapter implements TranscriptStorePort {
  private readonly directory?: string;
  private readonly now: () => Date;

  constructor(options: FileTranscriptStoreOptions = {}) {
    this.directory = options.directory;
    this.now = options.now ?? (() => new Date());
  }

  async save(transcript: Transcript, targetPath?: string): Promise<string> {
    const filePath = targetPath?.trim() || defaultTranscriptPath(this.now());
    const absolutePath = path.resolve(this.directory ?? process.cwd(), filePath);

    await fsp.mkdir(path.dirname(absolutePath), { recursive: true });
    await fsp.writeFile(
      absolutePath,
      JSON.stringify(transcript, null, 2),
      "utf-8",
    );
    await logger.info(
      `transcript saved: ${absolutePath} (${transcript.history.length} messages)`,
    );
    return filePath;
  }
}
