import { writeFile } from "node:fs/promises";
import { renderSingleShotPrompt } from "../agent/prompts.js";
import { requirementsOf, type Fixture } from "../fixtures/loadFixture.js";
import { tokensPerSecond } from "../llm/provider.js";
import { createFixturePipeline, fixtureTimeouts, type BenchDeps } from "./context.js";
import { extractCode } from "./extractCode.js";
import { withRestoredFile } from "./restore.js";
import { createBenchmarkResult, type BenchmarkResult } from "./types.js";

/** One prompt, one reply, one validation. The target file is restored before returning. */
export const runSingleShot = async (fixture: Fixture, runNumber: number, deps: BenchDeps): Promise<BenchmarkResult> => {
  const now = deps.now ?? (() => new Date());
  const timestamp = now().toISOString();
  const emit = deps.onEvent ?? (() => undefined);
  const pipeline = createFixturePipeline(fixture, deps);

  return withRestoredFile(fixture.targetPath, async (original) => {
    const prompt = renderSingleShotPrompt(fixture.prompt, original.toString("utf8"));

    emit({ type: "generating", fixture: fixture.name, runNumber });
    const reply = await deps.provider.complete([{ role: "user", content: prompt }], {
      model: deps.model,
      timeoutMs: fixtureTimeouts(fixture, deps).modelMs
    });
    const outputCode = extractCode(reply.text);
    await writeFile(fixture.targetPath, outputCode, "utf8");

    emit({ type: "validating", fixture: fixture.name, runNumber });
    const report = await pipeline.validate(outputCode, requirementsOf(fixture.spec));

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
      outputCode,
      errors: report.errors,
      outputTokens: reply.outputTokens,
      durationSec: reply.durationMs / 1000,
      tokensPerSec: tokensPerSecond(reply.outputTokens, reply.durationMs)
    });
  });
};
