import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { AgentAbortedError } from "../src/agent/errors.js";
import type { AgentEvent } from "../src/agent/events.js";
import { runAgentLoop } from "../src/agent/loop.js";
import { createToolRegistry } from "../src/agent/tools/registry.js";
import { ModelError } from "../src/llm/errors.js";
import { OllamaProvider } from "../src/llm/providers/ollama.js";
import { BROKEN_COMPONENT, FIXED_COMPONENT, createFakeProject, passingCompiler, recordingRunner } from "./helpers/fakeProject.js";
import { MockProvider, toolCall } from "./helpers/mockProvider.js";

const TARGET = "src/components/Counter.vue";

const setup = async () => {
  const root = await createFakeProject({ [TARGET]: BROKEN_COMPONENT });
  const registry = createToolRegistry({ projectRoot: root, writablePath: TARGET, runCmdImpl: passingCompiler });
  return { root, registry };
};

describe("agent loop", () => {
  test("reads, writes, compiles and finishes", async () => {
    const { root, registry } = await setup();
    const provider = new MockProvider([
      toolCall("read_file", { path: TARGET }),
      toolCall("write_file", { path: TARGET, content: FIXED_COMPONENT }),
      toolCall("run_compilation"),
      toolCall("finish", { summary: "fixed the type" })
    ]);
    const events: AgentEvent[] = [];

    const outcome = await runAgentLoop({
      provider,
      model: "test-model",
      registry,
      taskPrompt: "Fix the type error.",
      maxSteps: 5,
      onEvent: (event) => events.push(event)
    });

    expect(outcome.status).toBe("Succeeded");
    expect(outcome.stepCount).toBe(4);
    expect(outcome.compileAttempts).toBe(1);
    expect(outcome.summary).toBe("fixed the type");
    expect(outcome.finalContent).toBe(FIXED_COMPONENT);
    expect(outcome.outputTokens).toBe(40);
    expect(outcome.modelDurationMs).toBe(2000);
    expect(outcome.steps.map((step) => step.call?.name)).toEqual(["read_file", "write_file", "run_compilation", "finish"]);
    expect(await readFile(join(root, TARGET), "utf8")).toBe(FIXED_COMPONENT);
    expect(events.at(-1)).toEqual({ type: "finished", steps: 4, summary: "fixed the type" });

    const secondCall = provider.calls[1];
    expect(secondCall?.messages.map((message) => message.role)).toEqual(["system", "user", "assistant", "user"]);
    expect(secondCall?.messages[3]?.content).toBe(`Contents of ${TARGET}:\n${BROKEN_COMPONENT}`);
    expect(provider.calls[3]?.messages.at(-1)?.content).toBe("Compilation succeeded.");
  });

  test("stops at the step budget", async () => {
    const { registry } = await setup();
    const provider = new MockProvider(Array.from({ length: 10 }, () => toolCall("list_files")));
    const events: AgentEvent[] = [];

    const outcome = await runAgentLoop({
      provider,
      model: "test-model",
      registry,
      taskPrompt: "Fix it.",
      maxSteps: 3,
      onEvent: (event) => events.push(event)
    });

    expect(outcome.status).toBe("MaxStepsExceeded");
    expect(outcome.stepCount).toBe(3);
    expect(outcome.steps).toHaveLength(3);
    expect(provider.calls).toHaveLength(3);
    expect(outcome.finalContent).toBe(BROKEN_COMPONENT);
    expect(events.at(-1)).toEqual({ type: "max_steps", steps: 3 });
  });

  test("a malformed turn consumes one step and is corrected", async () => {
    const { registry } = await setup();
    const twoBlocks = `${toolCall("list_files")}\n${toolCall("finish")}`;
    const provider = new MockProvider(["I think the fix is obvious.", twoBlocks, toolCall("finish")]);

    const outcome = await runAgentLoop({ provider, model: "test-model", registry, taskPrompt: "Fix it.", maxSteps: 5 });

    expect(outcome.status).toBe("Succeeded");
    expect(outcome.stepCount).toBe(3);
    expect(outcome.steps[0]).toMatchObject({
      index: 0,
      rawText: "I think the fix is obvious.",
      call: null,
      result: null,
      failure: { kind: "MalformedToolCall", reason: "no fenced code block found" }
    });
    expect(outcome.steps[1]?.failure).toEqual({ kind: "MalformedToolCall", reason: "expected exactly one code block, found 2" });
    expect(provider.calls[1]?.messages.at(-1)?.content).toBe(
      "Your last message could not be parsed as a tool call (no fenced code block found). Respond with exactly one JSON code block."
    );
  });

  test("returns denied writes to the model without touching the file", async () => {
    const { root, registry } = await setup();
    const provider = new MockProvider([toolCall("write_file", { path: "src/main.ts", content: "x" }), toolCall("finish")]);

    const outcome = await runAgentLoop({ provider, model: "test-model", registry, taskPrompt: "Fix it.", maxSteps: 5 });

    expect(outcome.steps[0]?.result).toEqual({
      ok: false,
      code: "WriteDenied",
      message: `Writing to 'src/main.ts' is not permitted. Allowed: ${TARGET}`
    });
    expect(provider.calls[1]?.messages.at(-1)?.content).toBe(
      `Tool write_file failed [WriteDenied]: Writing to 'src/main.ts' is not permitted. Allowed: ${TARGET}`
    );
    expect(await readFile(join(root, TARGET), "utf8")).toBe(BROKEN_COMPONENT);
  });

  test("aborts on a transport failure with the partial log", async () => {
    const { registry } = await setup();
    const provider = new MockProvider([
      toolCall("read_file", { path: TARGET }),
      new ModelError("ConnectionFailed", "test-model", "Connection error to Ollama API at http://localhost:11434")
    ]);
    const events: AgentEvent[] = [];

    const error = await runAgentLoop({
      provider,
      model: "test-model",
      registry,
      taskPrompt: "Fix it.",
      maxSteps: 5,
      onEvent: (event) => events.push(event)
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AgentAbortedError);
    if (error instanceof AgentAbortedError) {
      expect(error.steps).toHaveLength(1);
      expect(error.message).toBe("Agent run aborted at step 2: Connection error to Ollama API at http://localhost:11434");
      expect(error.cause).toBeInstanceOf(ModelError);
    }
    expect(events.at(-1)).toEqual({
      type: "aborted",
      steps: 1,
      message: "Connection error to Ollama API at http://localhost:11434"
    });
  });

  test("aborts when the compiler cannot be started", async () => {
    const root = await createFakeProject({ [TARGET]: BROKEN_COMPONENT });
    const { runCmdImpl } = recordingRunner({ ok: false, code: -1, stdout: "", stderr: "", spawnError: "ENOENT" });
    const registry = createToolRegistry({ projectRoot: root, writablePath: TARGET, runCmdImpl });
    const provider = new MockProvider([
      toolCall("write_file", { path: TARGET, content: FIXED_COMPONENT }),
      toolCall("run_compilation"),
      toolCall("finish")
    ]);
    const events: AgentEvent[] = [];

    const error = await runAgentLoop({
      provider,
      model: "test-model",
      registry,
      taskPrompt: "Fix it.",
      maxSteps: 5,
      onEvent: (event) => events.push(event)
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AgentAbortedError);
    if (error instanceof AgentAbortedError) {
      expect(error.message).toBe("Agent run aborted at step 2: Toolchain missing: could not start 'npm' (ENOENT)");
      expect(error.steps.map((step) => step.call?.name)).toEqual(["write_file"]);
    }
    expect(provider.calls).toHaveLength(2);
    expect(events.slice(-2)).toEqual([
      { type: "tool_start", step: 2, name: "run_compilation" },
      { type: "aborted", steps: 1, message: "Toolchain missing: could not start 'npm' (ENOENT)" }
    ]);
  });

  test("aborts when the model server sends back a page that is not JSON", async () => {
    const { registry } = await setup();
    const provider = new OllamaProvider({
      baseUrl: "http://ollama.test:11434",
      fetchImpl: async () => new Response("<html>proxy error</html>", { status: 200 })
    });
    const events: AgentEvent[] = [];

    const error = await runAgentLoop({
      provider,
      model: "test-model",
      registry,
      taskPrompt: "Fix it.",
      maxSteps: 5,
      onEvent: (event) => events.push(event)
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AgentAbortedError);
    if (error instanceof AgentAbortedError) {
      expect(error.steps).toHaveLength(0);
      expect(error.cause).toBeInstanceOf(ModelError);
      expect(error.cause instanceof ModelError ? error.cause.kind : null).toBe("ConnectionFailed");
    }
    expect(events.at(-1)?.type).toBe("aborted");
  });

  test("replays identically with the same scripted replies", async () => {
    const script = [toolCall("write_file", { path: TARGET, content: FIXED_COMPONENT }), "oops", toolCall("finish")];
    const fixedNow = () => new Date("2026-01-01T00:00:00.000Z");

    const first = await setup();
    const a = await runAgentLoop({ provider: new MockProvider(script), model: "m", registry: first.registry, taskPrompt: "t", maxSteps: 5, now: fixedNow });
    const second = await setup();
    const b = await runAgentLoop({ provider: new MockProvider(script), model: "m", registry: second.registry, taskPrompt: "t", maxSteps: 5, now: fixedNow });

    expect(b.status).toBe(a.status);
    expect(b.finalContent).toBe(a.finalContent);
    expect(b.steps.map((step) => step.rawText)).toEqual(a.steps.map((step) => step.rawText));
    expect(b.steps.map((step) => step.failure)).toEqual(a.steps.map((step) => step.failure));
  });

  test("rejects a non-positive step budget", async () => {
    const { registry } = await setup();
    await expect(
      runAgentLoop({ provider: new MockProvider([]), model: "m", registry, taskPrompt: "t", maxSteps: 0 })
    ).rejects.toThrow("maxSteps must be a positive integer, got 0");
  });
});
