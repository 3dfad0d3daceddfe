export type ChatInput =
  | { kind: "empty" }
  | { kind: "message"; content: string }
  | { kind: "help" }
  | { kind: "reset" }
  | { kind: "exit" }
  | { kind: "save"; path?: string }
  | { kind: "unknown_command"; name: string };

export const COMMAND_PREFIX = "/";

export const HELP_TEXT = [
  "Commands:",
  "  /exit or /quit   Exit the chat",
  "  /reset           Reset the conversation history",
  "  /save <path>     Save transcript to a JSON file",
  "  /help            Show this help",
].join("\n");

export function interpretInput(line: string): ChatInput {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: "empty" };
  }
  if (!trimmed.startsWith(COMMAND_PREFIX)) {
    return { kind: "message", content: trimmed };
  }

  const separator = trimmed.search(/\s/);
  const name = separator === -1 ? trimmed : trimmed.slice(0, separator);
  const argument = separator === -1 ? "" : trimmed.slice(separator).trim();

  switch (name) {
    case "/help":
      return { kind: "help" };
    case "/reset":
      return { kind: "reset" };
    case "/exit":
    case "/quit":
      return { kind: "exit" };
    case "/save":
      return argument ? { kind: "save", path: argument } : { kind: "save" };
    default:
      return { kind: "unknown_command", name };
  }
}
