import { createProgram } from "../../../main";
import { ConfigPort } from "../../../ports/outbound/config.port";
import { FakePuller } from "../../helpers/fake-llm-client";
import {
  FakeOllamaServer,
  ScriptedDaemon,
  chatBodies,
  scriptedDaemon,
  startFakeOllama,
} from "../../helpers/fake-ollama-server";

const noDefaultModel: ConfigPort = {
  getDefaultModel: async () => undefined,
  setDefaultModel: async () => undefined,
};

describe("F-004 startup checks acceptance", () => {
  let server: FakeOllamaServer | undefined;
  let errorSpy: jest.SpyInstance;
  let writeSpy: jest.SpyInstance;

  async function runOneShot(
    port: number,
    puller: FakePuller,
    model = "llama3",
  ): Promise<void> {
    const program = createProgram({
      env: { OLLAMA_PORT: String(port) },
      config: noDefaultModel,
      puller,
    });
    await program.parseAsync(["-m", model, "-p", "Hello"], { from: "user" });
  }

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    writeSpy = jest
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    await server?.close();
    server = undefined;
  });

  it("exits non-zero with a hint when no daemon listens", async () => {
    const stopped = await startFakeOllama((_req, res) => {
      res.end();
    });
    const { port } = stopped.endpoint;
    await stopped.close();
    const puller = new FakePuller("pulled");

    await runOneShot(port, puller);

    expect(errorSpy).toHaveBeenCalledWith(
      `Cannot reach Ollama at http://127.0.0.1:${port}. Is the daemon running?\nStart it with: ollama serve`,
    );
    expect(process.exitCode).toBe(1);
    expect(puller.pulled).toEqual([]);
    expect(writeSpy).not.toHaveBeenCalled();
  });

  it("pulls a missing model once and then chats", async () => {
    const script: ScriptedDaemon = {
      models: ["smollm2:1.7b"],
      replies: [["Hi"]],
    };
    server = await startFakeOllama(scriptedDaemon(script));
    const puller = new FakePuller("pulled", (model) => {
      script.models.push(`${model}:latest`);
    });

    await runOneShot(server.endpoint.port, puller);

    expect(puller.pulled).toEqual(["llama3"]);
    expect(chatBodies(server)).toHaveLength(1);
    expect(writeSpy.mock.calls).toEqual([["Hi"], ["\n"]]);
    expect(process.exitCode).toBeUndefined();
  });

  it("lists the installed models when the pull fails", async () => {
    server = await startFakeOllama(
      scriptedDaemon({ models: ["smollm2:1.7b"], replies: [["Hi"]] }),
    );
    const puller = new FakePuller("failed");

    await runOneShot(server.endpoint.port, puller);

    expect(errorSpy).toHaveBeenCalledWith(
      [
        "Failed to pull model 'llama3' via the ollama CLI. You can pull manually:",
        "  ollama pull llama3",
        "Installed models: smollm2:1.7b",
      ].join("\n"),
    );
    expect(chatBodies(server)).toEqual([]);
    expect(process.exitCode).toBe(1);
  });

  it("fails when the model is still missing after a successful pull", async () => {
    server = await startFakeOllama(
      scriptedDaemon({ models: [], replies: [["Hi"]] }),
    );

    await runOneShot(server.endpoint.port, new FakePuller("pulled"));

    expect(errorSpy).toHaveBeenCalledWith(
      [
        "Model 'llama3' is still not listed by the daemon after pulling. Try:",
        "  ollama pull llama3",
        "Installed models: (no models available)",
      ].join("\n"),
    );
    expect(process.exitCode).toBe(1);
  });

  it("skips the pull when the model is already installed", async () => {
    server = await startFakeOllama(
      scriptedDaemon({ models: ["llama3:latest"], replies: [["Hi"]] }),
    );
    const puller = new FakePuller("pulled");

    await runOneShot(server.endpoint.port, puller);

    expect(puller.pulled).toEqual([]);
    expect(process.exitCode).toBeUndefined();
  });
});
