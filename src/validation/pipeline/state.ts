import { Annotation } from "@langchain/langgraph";
import type {
  CompilationResult,
  NamingConventions,
  NamingResult,
  PatternResult,
  RequiredPatterns,
  ScoringWeights,
  SfcFacts
} from "../types.js";

export type ValidationRequirements = {
  patterns: RequiredPatterns;
  naming: NamingConventions;
  weights: ScoringWeights;
};

export type AuditItem = {
  node: string;
  ok: boolean;
  note?: string;
};

export const PipelineStateAnnotation = Annotation.Root({
  code: Annotation<string>,
  requirements: Annotation<ValidationRequirements>,
  compilation: Annotation<CompilationResult | null>,
  facts: Annotation<SfcFacts | null>,
  patternResult: Annotation<PatternResult | null>,
  namingResult: Annotation<NamingResult | null>,
  finalScore: Annotation<number | null>,
  /** configuration failure from the compile step; rethrown after the graph ends */
  fatal: Annotation<Error | null>,
  audit: Annotation<AuditItem[]>,
  errors: Annotation<string[]>
});

export type PipelineState = typeof PipelineStateAnnotation.State;

export const createInitialState = (args: { code: string; requirements: ValidationRequirements }): PipelineState => ({
  code: args.code,
  requirements: args.requirements,
  compilation: null,
  facts: null,
  patternResult: null,
  namingResult: null,
  finalScore: null,
  fatal: null,
  audit: [],
  errors: []
});
