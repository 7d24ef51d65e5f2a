import type { LlmProvider } from "../llm/provider.js";
import type { Fixture } from "../fixtures/loadFixture.js";
import type { CmdRunner } from "../runner/runCmd.js";
import { createSubprocessAstParser } from "../validation/astParser.js";
import { runCompilation } from "../validation/compilation.js";
import { createValidationPipeline, type ValidationPipeline } from "../validation/pipeline/graph.js";
import type { BenchEventSink } from "./events.js";

export type BenchDeps = {
  provider: LlmProvider;
  model: string;
  runCmdImpl: CmdRunner;
  /** used when the fixture sets no model timeout */
  modelTimeoutMs?: number;
  onEvent?: BenchEventSink;
  now?: () => Date;
};

const secToMs = (sec: number | undefined): number | undefined => (sec === undefined ? undefined : sec * 1000);

export const fixtureTimeouts = (fixture: Fixture, deps: BenchDeps) => ({
  compileMs: secToMs(fixture.spec.timeouts.compile_sec),
  astMs: secToMs(fixture.spec.timeouts.ast_sec),
  modelMs: secToMs(fixture.spec.timeouts.model_sec) ?? deps.modelTimeoutMs
});

/** Fresh pipeline bound to the fixture's project; built once per run. */
export const createFixturePipeline = (fixture: Fixture, deps: BenchDeps): ValidationPipeline => {
  const timeouts = fixtureTimeouts(fixture, deps);
  return createValidationPipeline({
    compile: () =>
      runCompilation({ projectRoot: fixture.projectRoot, runCmdImpl: deps.runCmdImpl, timeoutMs: timeouts.compileMs }),
    parseAst: createSubprocessAstParser({ runCmdImpl: deps.runCmdImpl, timeoutMs: timeouts.astMs })
  });
};
