import { writeFile } from "node:fs/promises";
import { runAgentLoop } from "../agent/loop.js";
import { createToolRegistry } from "../agent/tools/registry.js";
import { requirementsOf, type Fixture } from "../fixtures/loadFixture.js";
import { tokensPerSecond } from "../llm/provider.js";
import { createFixturePipeline, fixtureTimeouts, type BenchDeps } from "./context.js";
import { withRestoredFile } from "./restore.js";
import { createBenchmarkResult, type BenchmarkResult } from "./types.js";

/**
 * Lets the model fix the target file through tools, then validates whatever the file holds
 * when the loop ends. `AgentAbortedError` propagates after the file is restored.
 */
export const runAgentBenchmark = async (fixture: Fixture, runNumber: number, deps: BenchDeps): Promise<BenchmarkResult> => {
  const now = deps.now ?? (() => new Date());
  const timestamp = now().toISOString();
  const timeouts = fixtureTimeouts(fixture, deps);
  const pipeline = createFixturePipeline(fixture, deps);

  return withRestoredFile(fixture.targetPath, async (original) => {
    // the shipped content is the starting state for every run
    await writeFile(fixture.targetPath, original);

    const registry = createToolRegistry({
      projectRoot: fixture.projectRoot,
      writablePath: fixture.targetFile,
      runCmdImpl: deps.runCmdImpl,
      compileTimeoutMs: timeouts.compileMs
    });

    const outcome = await runAgentLoop({
      provider: deps.provider,
      model: deps.model,
      registry,
      taskPrompt: fixture.prompt,
      maxSteps: fixture.spec.max_steps,
      timeoutMs: timeouts.modelMs,
      onEvent: (event) => deps.onEvent?.({ type: "agent", fixture: fixture.name, runNumber, event }),
      now
    });

    deps.onEvent?.({ type: "validating", fixture: fixture.name, runNumber });
    const report = await pipeline.validate(outcome.finalContent, requirementsOf(fixture.spec));

    return createBenchmarkResult({
      model: deps.model,
      fixture: fixture.name,
      category: fixture.category,
      runNumber,
      timestamp,
      compilation: report.compilation,
      pattern: report.pattern,
      naming: report.naming,
      scoringWeights: fixture.spec.scoring,
      outputCode: outcome.finalContent,
      errors: report.errors,
      outputTokens: outcome.outputTokens,
      durationSec: outcome.modelDurationMs / 1000,
      tokensPerSec: tokensPerSecond(outcome.outputTokens, outcome.modelDurationMs),
      agent: {
        status: outcome.status,
        succeeded: outcome.status === "Succeeded",
        steps: outcome.stepCount,
        maxSteps: fixture.spec.max_steps,
        compileAttempts: outcome.compileAttempts,
        summary: outcome.summary,
        toolCallLog: outcome.steps
      }
    });
  });
};
