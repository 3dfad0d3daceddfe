import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";
import {
  ChatEventLogEntry,
  ChatEventLogSettings,
  createChatEventLogger,
  maskSensitiveText,
  resolveChatEventLogSettings,
  sanitizeChatEventLogEntry,
} from "../../../operations/logging/chat-event-logger";

function turn(userInput: string, timestamp: string): ChatEventLogEntry {
  return {
    timestamp,
    session_id: "s-1",
    event_type: "turn_completed",
    model: "test-model",
    resolution_source: "default",
    user_input: userInput,
    assistant_response: "ok",
    duration_ms: 10,
  };
}

describe("chat-event-logger", () => {
  let tempDir: string;

  function settings(overrides: Partial<ChatEventLogSettings> = {}): ChatEventLogSettings {
    return {
      file: path.join(tempDir, "chat-events.jsonl"),
      maxBytes: 1024 * 1024,
      keepRotated: 5,
      hardenDirectory: false,
      ...overrides,
    };
  }

  beforeEach(async () => {
    tempDir = await fsp.mkdtemp(path.join(os.tmpdir(), "chat-event-logger-"));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fsp.rm(tempDir, { recursive: true, force: true });
  });

  describe("masking", () => {
    it("masks sensitive values in chat payloads", () => {
      const entry = sanitizeChatEventLogEntry({
        ...turn(
          "mail test@example.com token sk-12345678901234567890 card 4111-1111-1111-1111",
          "2026-02-15T00:00:00.000Z",
        ),
        assistant_response:
          "Bearer thisisaverylongtokenvalue01234567890123456789",
      });

      expect(entry.user_input).toBe(
        "mail [REDACTED_EMAIL] token [REDACTED_KEY] card [REDACTED_NUMBER]",
      );
      expect(entry.assistant_response).toBe("[REDACTED_TOKEN]");
    });

    it("masks error messages too", () => {
      const entry = sanitizeChatEventLogEntry({
        timestamp: "2026-02-15T00:00:00.000Z",
        session_id: "s-1",
        event_type: "turn_failed",
        error_message: "rejected for test@example.com",
      });

      expect(entry.error_message).toBe("rejected for [REDACTED_EMAIL]");
    });

    it("leaves ordinary text untouched", () => {
      expect(maskSensitiveText("Hi there, see you at 10:30")).toBe(
        "Hi there, see you at 10:30",
      );
    });
  });

  describe("settings", () => {
    it("defaults to the logs directory under the config dir", () => {
      expect(
        resolveChatEventLogSettings({ LOCAL_LLM_CHAT_CONFIG_DIR: "/tmp/cfg" }),
      ).toEqual({
        file: path.join("/tmp/cfg", "logs", "chat-events.jsonl"),
        maxBytes: 1024 * 1024,
        keepRotated: 5,
        hardenDirectory: true,
      });
    });

    it("honours an explicit file and size limits", () => {
      expect(
        resolveChatEventLogSettings({
          CHAT_EVENT_LOG_FILE: "/var/tmp/events.log",
          CHAT_EVENT_LOG_MAX_BYTES: "2048",
          CHAT_EVENT_LOG_KEEP: "2",
        }),
      ).toEqual({
        file: "/var/tmp/events.log",
        maxBytes: 2048,
        keepRotated: 2,
        hardenDirectory: false,
      });
    });

    it("ignores invalid limits", () => {
      const resolved = resolveChatEventLogSettings({
        CHAT_EVENT_LOG_DIR: "/tmp/events",
        CHAT_EVENT_LOG_MAX_BYTES: "lots",
        CHAT_EVENT_LOG_KEEP: "-1",
      });

      expect(resolved.file).toBe(path.join("/tmp/events", "chat-events.jsonl"));
      expect(resolved.maxBytes).toBe(1024 * 1024);
      expect(resolved.keepRotated).toBe(5);
    });
  });

  describe("writing", () => {
    it("writes one JSON object per line", async () => {
      const logEvent = createChatEventLogger(settings());

      await logEvent({
        timestamp: "2026-02-15T00:00:00.000Z",
        session_id: "s-1",
        event_type: "transcript_saved",
        transcript_path: "chat.json",
        message_count: 3,
      });

      const current = await fsp.readFile(
        path.join(tempDir, "chat-events.jsonl"),
        "utf-8",
      );
      expect(current).toBe(
        '{"timestamp":"2026-02-15T00:00:00.000Z","session_id":"s-1","event_type":"transcript_saved","transcript_path":"chat.json","message_count":3}\n',
      );
    });

    it("rotates by size and writes with owner-only permission", async () => {
      const config = settings({ maxBytes: 120 });
      const logEvent = createChatEventLogger(config);

      await logEvent(turn("x".repeat(240), "2026-02-15T00:00:00.000Z"));
      await logEvent(turn("second", "2026-02-15T00:00:01.000Z"));

      const files = await fsp.readdir(tempDir);
      expect(files.filter((f) => f.startsWith("chat-events.jsonl."))).toHaveLength(1);

      const current = await fsp.readFile(config.file, "utf-8");
      expect(current).toContain('"user_input":"second"');

      const stat = await fsp.stat(config.file);
      expect(stat.mode & 0o777).toBe(0o600);
    });

    it("keeps only the newest rotated files", async () => {
      const config = settings({ maxBytes: 10, keepRotated: 1 });
      await fsp.writeFile(`${config.file}.2026-01-01T00-00-00-000Z`, "old\n");
      await fsp.writeFile(`${config.file}.2026-01-02T00-00-00-000Z`, "older\n");
      await fsp.writeFile(config.file, "x".repeat(20));

      await createChatEventLogger(config)(turn("new", "2026-02-15T00:00:00.000Z"));

      const rotated = (await fsp.readdir(tempDir)).filter((f) =>
        f.startsWith("chat-events.jsonl."),
      );
      expect(rotated).toHaveLength(1);
      expect(rotated[0]).not.toBe("chat-events.jsonl.2026-01-01T00-00-00-000Z");
      expect(rotated[0]).not.toBe("chat-events.jsonl.2026-01-02T00-00-00-000Z");
    });

    it("restricts only the app-owned directory", async () => {
      const customDir = path.join(tempDir, "custom");
      const customLogFile = path.join(customDir, "events.log");
      const chmodSpy = jest.spyOn(fsp, "chmod");

      await createChatEventLogger(settings({ file: customLogFile }))({
        timestamp: "2026-02-15T00:00:00.000Z",
        session_id: "s-1",
        event_type: "session_start",
        model: "test-model",
        resolution_source: "default",
        mode: "interactive",
      });

      expect(chmodSpy).not.toHaveBeenCalledWith(customDir, 0o700);
      expect(chmodSpy).toHaveBeenCalledWith(customLogFile, 0o600);
    });

    it("restricts the default log directory to its owner", async () => {
      const logDir = path.join(tempDir, "logs");

      await createChatEventLogger(
        settings({ file: path.join(logDir, "chat-events.jsonl"), hardenDirectory: true }),
      )(turn("hi", "2026-02-15T00:00:00.000Z"));

      const stat = await fsp.stat(logDir);
      expect(stat.mode & 0o777).toBe(0o700);
    });
  });
});
