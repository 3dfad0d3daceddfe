import {
  HELP_TEXT,
  interpretInput,
} from "../../../domain/conversation/command-interpreter";

describe("interpretInput", () => {
  it.each(["", "   ", "\t"])("classifies %j as empty", (line) => {
    expect(interpretInput(line)).toEqual({ kind: "empty" });
  });

  it("passes ordinary content through trimmed", () => {
    expect(interpretInput("  Hello there  ")).toEqual({
      kind: "message",
      content: "Hello there",
    });
  });

  it("keeps a slash that is not at the start as content", () => {
    expect(interpretInput("and/or")).toEqual({
      kind: "message",
      content: "and/or",
    });
  });

  it.each([
    ["/help", { kind: "help" }],
    ["/reset", { kind: "reset" }],
    ["/exit", { kind: "exit" }],
    ["/quit", { kind: "exit" }],
    ["/save", { kind: "save" }],
    ["/save  out/chat.json ", { kind: "save", path: "out/chat.json" }],
  ])("recognizes %s", (line, expected) => {
    expect(interpretInput(line)).toEqual(expected);
  });

  it("reports unknown directives by name", () => {
    expect(interpretInput("/unknowncmd extra")).toEqual({
      kind: "unknown_command",
      name: "/unknowncmd",
    });
  });

  it("lists every directive in the help text", () => {
    for (const directive of ["/exit", "/quit", "/reset", "/save", "/help"]) {
      expect(HELP_TEXT).toContain(directive);
    }
  });
});
