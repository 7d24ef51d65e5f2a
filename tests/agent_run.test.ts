import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { AgentAbortedError } from "../src/agent/errors.js";
import { runAgentBenchmark } from "../src/bench/agentRun.js";
import { ToolchainMissingError } from "../src/errors.js";
import { loadFixture } from "../src/fixtures/loadFixture.js";
import { ModelError } from "../src/llm/errors.js";
import type { CmdResult } from "../src/runner/runCmd.js";
import { FIXED_COMPONENT, benchRunner } from "./helpers/fakeProject.js";
import { DEFAULT_SCORING, createFixtureDir } from "./helpers/fixture.js";
import { MockProvider, toolCall } from "./helpers/mockProvider.js";

const TARGET = "src/components/Counter.vue";
// CRLF line endings so a text round trip would show up as a diff
const ORIGINAL = Buffer.from('<script setup lang="ts">\r\nconst count: number = "zero";\r\n</script>\r\n', "utf8");

/** Compiles when the target no longer assigns a string to the number. */
const typeCheck = (cwd: string): CmdResult =>
  readFileSync(join(cwd, TARGET), "utf8").includes('"zero"')
    ? { ok: false, code: 2, stdout: `${TARGET}(2,7): error TS2322: Type 'string' is not assignable to type 'number'.\n`, stderr: "" }
    : { ok: true, code: 0, stdout: "", stderr: "" };

const setup = async () => {
  const dir = await createFixtureDir({
    category: "agent",
    name: "ts-bugfix",
    prompt: "The counter does not compile. Fix it.",
    spec: {
      target_file: TARGET,
      required_patterns: { script_lang: "ts" },
      scoring: DEFAULT_SCORING,
      max_steps: 4
    },
    files: { [TARGET]: ORIGINAL }
  });
  return loadFixture(dir);
};

const fixingScript = (): string[] => [
  toolCall("write_file", { path: TARGET, content: FIXED_COMPONENT }),
  toolCall("run_compilation"),
  toolCall("finish", { summary: "assigned a number" })
];

const deps = (provider: MockProvider) => ({
  provider,
  model: "test-model",
  runCmdImpl: benchRunner(typeCheck),
  now: () => new Date("2026-01-01T00:00:00.000Z")
});

describe("agent benchmark run", () => {
  test("scores the fixed file and restores the original bytes", async () => {
    const fixture = await setup();

    const result = await runAgentBenchmark(fixture, 1, deps(new MockProvider(fixingScript())));

    expect(result.compiles).toBe(true);
    expect(result.pattern.score).toBe(10);
    expect(result.naming.score).toBe(1);
    expect(result.finalScore).toBeCloseTo(10, 10);
    expect(result.outputCode).toBe(FIXED_COMPONENT);
    expect(result.category).toBe("agent");
    expect(result.timestamp).toBe("2026-01-01T00:00:00.000Z");
    expect(result.agent).toMatchObject({
      status: "Succeeded",
      succeeded: true,
      steps: 3,
      maxSteps: 4,
      compileAttempts: 1,
      summary: "assigned a number"
    });
    expect((await readFile(fixture.targetPath)).equals(ORIGINAL)).toBe(true);
  });

  test("an exhausted budget still validates the final file", async () => {
    const fixture = await setup();
    const provider = new MockProvider(Array.from({ length: 4 }, () => toolCall("read_file", { path: TARGET })));

    const result = await runAgentBenchmark(fixture, 1, deps(provider));

    expect(result.agent?.status).toBe("MaxStepsExceeded");
    expect(result.agent?.steps).toBe(4);
    expect(result.compiles).toBe(false);
    expect(result.compilation.errors).toEqual([
      `${TARGET}(2,7): error TS2322: Type 'string' is not assignable to type 'number'.`
    ]);
    // pattern 10/10 * 0.3 + naming 1 * 0.1
    expect(result.finalScore).toBeCloseTo(4, 10);
    expect((await readFile(fixture.targetPath)).equals(ORIGINAL)).toBe(true);
  });

  test("an aborted run restores the file and carries the partial log", async () => {
    const fixture = await setup();
    const provider = new MockProvider([
      toolCall("write_file", { path: TARGET, content: FIXED_COMPONENT }),
      new ModelError("TimedOut", "test-model", "Ollama request exceeded timeout of 1000ms")
    ]);

    const error = await runAgentBenchmark(fixture, 1, deps(provider)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AgentAbortedError);
    if (error instanceof AgentAbortedError) {
      expect(error.steps).toHaveLength(1);
    }
    expect((await readFile(fixture.targetPath)).equals(ORIGINAL)).toBe(true);
  });

  test("a compiler that cannot start aborts the run and restores the file", async () => {
    const fixture = await setup();
    const missingNpm = (): CmdResult => ({ ok: false, code: -1, stdout: "", stderr: "", spawnError: "ENOENT" });

    const error = await runAgentBenchmark(fixture, 1, {
      ...deps(new MockProvider(fixingScript())),
      runCmdImpl: benchRunner(missingNpm)
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AgentAbortedError);
    if (error instanceof AgentAbortedError) {
      expect(error.steps).toHaveLength(1);
      expect(error.cause).toBeInstanceOf(ToolchainMissingError);
    }
    expect((await readFile(fixture.targetPath)).equals(ORIGINAL)).toBe(true);
  });

  test("repeated runs with the same replies give the same result", async () => {
    const fixture = await setup();

    const first = await runAgentBenchmark(fixture, 1, deps(new MockProvider(fixingScript())));
    const second = await runAgentBenchmark(fixture, 2, deps(new MockProvider(fixingScript())));

    expect(second.finalScore).toBe(first.finalScore);
    expect(second.outputCode).toBe(first.outputCode);
    expect(second.agent?.steps).toBe(first.agent?.steps);
    expect((await readFile(fixture.targetPath)).equals(ORIGINAL)).toBe(true);
  });

  test("results are frozen", async () => {
    const fixture = await setup();
    const result = await runAgentBenchmark(fixture, 1, deps(new MockProvider(fixingScript())));

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.agent)).toBe(true);
    expect(Object.isFrozen(result.compilation.errors)).toBe(true);
  });
});
