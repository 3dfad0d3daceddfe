import { promises as fsp } from "fs";
import * as path from "path";
import { resolveConfigDir } from "../../config/paths";
import { ModelResolutionSource } from "../../shared/types/chat";

const EVENT_LOG_FILE_NAME = "chat-events.jsonl";
const DEFAULT_MAX_BYTES = 1024 * 1024;
const DEFAULT_KEEP_ROTATED = 5;

export interface ChatEventLogEntry {
  timestamp: string;
  session_id: string;
  event_type:
    | "session_start"
    | "model_pulled"
    | "turn_completed"
    | "turn_failed"
    | "conversation_reset"
    | "transcript_saved"
    | "session_end";
  model?: string;
  resolution_source?: ModelResolutionSource;
  mode?: "interactive" | "one_shot";
  user_input?: string;
  assistant_response?: string;
  duration_ms?: number;
  error_code?: string;
  error_message?: string;
  transcript_path?: string;
  message_count?: number;
}

export type ChatEventLogger = (entry: ChatEventLogEntry) => Promise<void>;

export interface ChatEventLogSettings {
  file: string;
  maxBytes: number;
  keepRotated: number;
  /** Only the app-owned log directory is restricted to the owner. */
  hardenDirectory: boolean;
}

function positiveInteger(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function resolveChatEventLogSettings(
  env: NodeJS.ProcessEnv = process.env,
): ChatEventLogSettings {
  const explicitFile = env.CHAT_EVENT_LOG_FILE?.trim();
  const dir =
    env.CHAT_EVENT_LOG_DIR?.trim() || path.join(resolveConfigDir(env), "logs");
  return {
    file: explicitFile || path.join(dir, EVENT_LOG_FILE_NAME),
    maxBytes: positiveInteger(env.CHAT_EVENT_LOG_MAX_BYTES, DEFAULT_MAX_BYTES),
    keepRotated: positiveInteger(env.CHAT_EVENT_LOG_KEEP, DEFAULT_KEEP_ROTATED),
    hardenDirectory: !explicitFile,
  };
}

const MASKING_RULES: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
  {
    pattern: /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi,
    replacement: "[REDACTED_EMAIL]",
  },
  {
    pattern: /\b(?:sk|pk)-[A-Za-z0-9_-]{16,}\b/g,
    replacement: "[REDACTED_KEY]",
  },
  {
    pattern: /\b(?:Bearer\s+)?[A-Za-z0-9._-]{32,}\b/g,
    replacement: "[REDACTED_TOKEN]",
  },
  { pattern: /\b(?:\d[ -]?){13,19}\b/g, replacement: "[REDACTED_NUMBER]" },
];

export function maskSensitiveText(text: string): string {
  return MASKING_RULES.reduce(
    (masked, rule) => masked.replace(rule.pattern, rule.replacement),
    text,
  );
}

function maskOptional(text: string | undefined): string | undefined {
  return text ? maskSensitiveText(text) : text;
}

export function sanitizeChatEventLogEntry(
  entry: ChatEventLogEntry,
): ChatEventLogEntry {
  return {
    ...entry,
    user_input: maskOptional(entry.user_input),
    assistant_response: maskOptional(entry.assistant_response),
    error_message: maskOptional(entry.error_message),
  };
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

async function restrictTo(targetPath: string, mode: number): Promise<void> {
  // Some filesystems reject chmod; the entry is still written.
  await fsp.chmod(targetPath, mode).catch(() => undefined);
}

async function pruneRotated(file: string, keep: number): Promise<void> {
  const dir = path.dirname(file);
  const prefix = `${path.basename(file)}.`;
  const rotated = (await fsp.readdir(dir))
    .filter((name) => name.startsWith(prefix))
    .sort();
  const stale = rotated.slice(0, Math.max(0, rotated.length - keep));
  await Promise.all(stale.map((name) => fsp.rm(path.join(dir, name), { force: true })));
}

async function rotateWhenFull(settings: ChatEventLogSettings): Promise<void> {
  let size: number;
  try {
    size = (await fsp.stat(settings.file)).size;
  } catch (error) {
    if (isMissingFile(error)) {
      return;
    }
    throw error;
  }
  if (size < settings.maxBytes) {
    return;
  }

  const suffix = new Date().toISOString().replace(/[:.]/g, "-");
  const rotated = `${settings.file}.${suffix}`;
  await fsp.rename(settings.file, rotated);
  await restrictTo(rotated, 0o600);
  await pruneRotated(settings.file, settings.keepRotated);
}

/** Appends masked entries as JSON lines, rotating the file by size. */
export function createChatEventLogger(
  settings: ChatEventLogSettings = resolveChatEventLogSettings(),
): ChatEventLogger {
  return async (entry) => {
    const dir = path.dirname(settings.file);
    await fsp.mkdir(dir, { recursive: true });
    if (settings.hardenDirectory) {
      await restrictTo(dir, 0o700);
    }
    await rotateWhenFull(settings);

    const line = `${JSON.stringify(sanitizeChatEventLogEntry(entry))}\n`;
    const handle = await fsp.open(settings.file, "a", 0o600);
    try {
      await handle.appendFile(line, "utf-8");
    } finally {
      await handle.close();
    }
    await restrictTo(settings.file, 0o600);
  };
}

export const noopChatEventLogger: ChatEventLogger = async () => undefined;
