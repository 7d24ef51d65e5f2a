import type { AgentStatus } from "../agent/loop.js";
import type { AgentStep } from "../agent/transcript.js";
import type { BenchCategory } from "../fixtures/schema.js";
import { computeFinalScore } from "../validation/scoring.js";
import type { CompilationResult, NamingResult, PatternResult, ScoringWeights } from "../validation/types.js";

export type AgentRunDetails = {
  status: Exclude<AgentStatus, "UnrecoverableError">;
  succeeded: boolean;
  steps: number;
  maxSteps: number;
  /** number of run_compilation calls */
  compileAttempts: number;
  summary?: string;
  toolCallLog: readonly AgentStep[];
};

export type BenchmarkResult = {
  readonly model: string;
  readonly fixture: string;
  readonly category: BenchCategory;
  readonly runNumber: number;
  readonly timestamp: string;
  readonly compiles: boolean;
  readonly compilation: CompilationResult;
  readonly pattern: PatternResult;
  readonly naming: NamingResult;
  readonly scoringWeights: ScoringWeights;
  readonly finalScore: number;
  readonly outputCode: string;
  readonly errors: readonly string[];
  readonly outputTokens: number;
  readonly durationSec: number;
  readonly tokensPerSec: number;
  readonly agent?: AgentRunDetails;
};

export type BenchmarkResultInput = Omit<BenchmarkResult, "finalScore" | "compiles">;

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

/** The only constructor for results; the final score is always derived from the sub-scores. */
export const createBenchmarkResult = (input: BenchmarkResultInput): BenchmarkResult => {
  const compiles = input.compilation.success;
  return deepFreeze({
    ...structuredClone(input),
    compiles,
    finalScore: computeFinalScore(input.scoringWeights, compiles, input.pattern.score, input.naming.score)
  });
};
