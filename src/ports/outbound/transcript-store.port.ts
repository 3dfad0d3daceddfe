import { Transcript } from "../../domain/conversation/conversation";

export interface TranscriptStorePort {
  /** Writes the transcript and returns the path actually used. */
  save(transcript: Transcript, targetPath?: string): Promise<string>;
}
