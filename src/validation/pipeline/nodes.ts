import { errorMessage } from "../../errors.js";
import { checkNaming, scanInterfaceNames, scanVariableNames } from "../naming.js";
import { checkPatterns, emptyPatternResult } from "../patterns.js";
import { computeFinalScore } from "../scoring.js";
import type { AstParser, Compiler, NamingResult, ValidatorOutcome } from "../types.js";
import type { PipelineState } from "./state.js";

export type PipelineDeps = {
  compile: Compiler;
  parseAst: AstParser;
};

/** Turns a throwing validator into an explicit outcome. */
export const runValidator = async <T>(fn: () => T | Promise<T>): Promise<ValidatorOutcome<T>> => {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error: errorMessage(error, "validator failed") };
  }
};

const appendAudit = (state: PipelineState, node: string, ok: boolean, note?: string): PipelineState["audit"] => [
  ...state.audit,
  { node, ok, note }
];

const failedNaming = (): NamingResult => ({
  followsConventions: false,
  violations: ["Naming validation failed"],
  score: 0
});

export const createPipelineNodes = (deps: PipelineDeps) => {
  const node_compile = async (state: PipelineState): Promise<Partial<PipelineState>> => {
    try {
      const compilation = await deps.compile();
      const note = `${compilation.success ? "succeeded" : "failed"} in ${compilation.durationSec.toFixed(2)}s (${compilation.errors.length} errors, ${compilation.warnings.length} warnings)`;
      return { compilation, audit: appendAudit(state, "compile", true, note) };
    } catch (error) {
      const fatal = error instanceof Error ? error : new Error(errorMessage(error));
      return { fatal, audit: appendAudit(state, "compile", false, fatal.message) };
    }
  };

  const node_check_patterns = async (state: PipelineState): Promise<Partial<PipelineState>> => {
    const required = state.requirements.patterns;
    const outcome = await runValidator(async () => {
      const facts = await deps.parseAst(state.code);
      return { facts, result: checkPatterns(facts, state.code, required) };
    });

    if (!outcome.ok) {
      return {
        facts: null,
        patternResult: emptyPatternResult(required, "AST parsing failed"),
        errors: [...state.errors, `Pattern validation error: ${outcome.error}`],
        audit: appendAudit(state, "check_patterns", false, outcome.error)
      };
    }
    return {
      facts: outcome.value.facts,
      patternResult: outcome.value.result,
      audit: appendAudit(state, "check_patterns", true, `score ${outcome.value.result.score}/10`)
    };
  };

  const node_check_naming = async (state: PipelineState): Promise<Partial<PipelineState>> => {
    const outcome = await runValidator(() =>
      checkNaming(
        {
          interfaces: state.facts?.interfaces ?? scanInterfaceNames(state.code),
          variables: state.facts?.variables ?? scanVariableNames(state.code)
        },
        state.requirements.naming
      )
    );

    if (!outcome.ok) {
      return {
        namingResult: failedNaming(),
        errors: [...state.errors, `Naming validation error: ${outcome.error}`],
        audit: appendAudit(state, "check_naming", false, outcome.error)
      };
    }
    return {
      namingResult: outcome.value,
      audit: appendAudit(state, "check_naming", true, `${outcome.value.violations.length} violations`)
    };
  };

  const node_score = async (state: PipelineState): Promise<Partial<PipelineState>> => {
    const compiles = state.compilation?.success ?? false;
    const pattern = state.patternResult?.score ?? 0;
    const naming = state.namingResult?.score ?? 0;
    const finalScore = computeFinalScore(state.requirements.weights, compiles, pattern, naming);
    return { finalScore, audit: appendAudit(state, "score", true, finalScore.toFixed(2)) };
  };

  return { node_compile, node_check_patterns, node_check_naming, node_score };
};
