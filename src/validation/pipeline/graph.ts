import { END, START, StateGraph } from "@langchain/langgraph";
import type { CompilationResult, NamingResult, PatternResult, SfcFacts } from "../types.js";
import { createPipelineNodes, type PipelineDeps } from "./nodes.js";
import { createInitialState, PipelineStateAnnotation, type AuditItem, type PipelineState, type ValidationRequirements } from "./state.js";

export type ValidationReport = {
  compilation: CompilationResult;
  pattern: PatternResult;
  naming: NamingResult;
  facts: SfcFacts | null;
  finalScore: number;
  errors: string[];
  audit: AuditItem[];
};

const routeAfterCompile = (state: PipelineState): "check_patterns" | typeof END =>
  state.fatal ? END : "check_patterns";

export const buildValidationGraph = (deps: PipelineDeps) => {
  const nodes = createPipelineNodes(deps);
  return new StateGraph(PipelineStateAnnotation)
    .addNode("compile", nodes.node_compile)
    .addNode("check_patterns", nodes.node_check_patterns)
    .addNode("check_naming", nodes.node_check_naming)
    .addNode("score", nodes.node_score)
    .addEdge(START, "compile")
    .addConditionalEdges("compile", routeAfterCompile)
    .addEdge("check_patterns", "check_naming")
    .addEdge("check_naming", "score")
    .addEdge("score", END)
    .compile();
};

export type ValidationPipeline = {
  validate(code: string, requirements: ValidationRequirements): Promise<ValidationReport>;
};

/**
 * Compile, pattern check, naming check, score. Pattern and naming failures degrade to zero
 * sub-scores with an entry in `errors`; a compile-step configuration error is rethrown.
 */
export const createValidationPipeline = (deps: PipelineDeps): ValidationPipeline => {
  const graph = buildValidationGraph(deps);

  return {
    validate: async (code, requirements) => {
      const state = await graph.invoke(createInitialState({ code, requirements }));
      if (state.fatal) {
        throw state.fatal;
      }
      if (!state.compilation || !state.patternResult || !state.namingResult || state.finalScore === null) {
        throw new Error("validation pipeline ended before scoring");
      }
      return {
        compilation: state.compilation,
        pattern: state.patternResult,
        naming: state.namingResult,
        facts: state.facts,
        finalScore: state.finalScore,
        errors: state.errors,
        audit: state.audit
      };
    }
  };
};
