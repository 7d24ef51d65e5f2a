import { errorMessage } from "../errors.js";
import type { Fixture } from "../fixtures/loadFixture.js";
import { runAgentBenchmark } from "./agentRun.js";
import type { BenchDeps } from "./context.js";
import { runSingleShot } from "./singleShot.js";
import type { BenchmarkResult } from "./types.js";

export const runOnce = (fixture: Fixture, runNumber: number, deps: BenchDeps): Promise<BenchmarkResult> => {
  switch (fixture.category) {
    case "agent":
      return runAgentBenchmark(fixture, runNumber, deps);
    case "refactoring":
    case "creation":
      return runSingleShot(fixture, runNumber, deps);
  }
};

/** Runs the fixture `runs` times in sequence. The first error stops the batch and is rethrown. */
export const runBenchmark = async (
  fixture: Fixture,
  deps: BenchDeps,
  options: { runs?: number } = {}
): Promise<BenchmarkResult[]> => {
  const runs = options.runs ?? 1;
  const results: BenchmarkResult[] = [];

  for (let runNumber = 1; runNumber <= runs; runNumber += 1) {
    deps.onEvent?.({ type: "run_start", fixture: fixture.name, category: fixture.category, runNumber, totalRuns: runs });
    try {
      const result = await runOnce(fixture, runNumber, deps);
      results.push(result);
      deps.onEvent?.({ type: "run_done", result });
    } catch (error) {
      deps.onEvent?.({ type: "run_aborted", fixture: fixture.name, runNumber, message: errorMessage(error) });
      throw error;
    }
  }

  return results;
};

export { runAgentBenchmark } from "./agentRun.js";
export { runSingleShot } from "./singleShot.js";
export { withRestoredFile } from "./restore.js";
export { extractCode } from "./extractCode.js";
export { createBenchmarkResult, type BenchmarkResult, type AgentRunDetails } from "./types.js";
export type { BenchDeps } from "./context.js";
export type { BenchEvent, BenchEventSink } from "./events.js";
