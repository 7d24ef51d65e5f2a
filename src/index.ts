export { runAgentLoop, type AgentOutcome, type AgentStatus } from "./agent/loop.js";
export { AgentAbortedError } from "./agent/errors.js";
export type { AgentEvent, AgentEventSink } from "./agent/events.js";
export { parseToolCall, type ParseFailure, type ParseFailureKind, type ParseResult } from "./agent/parser.js";
export { createToolRegistry } from "./agent/tools/registry.js";
export { TOOL_SPECS, type ToolCall, type ToolName, type ToolSpec } from "./agent/tools/specs.js";
export type { ToolRegistry, ToolResult } from "./agent/tools/types.js";
export type { AgentStep } from "./agent/transcript.js";
export * from "./bench/index.js";
export { loadBenchConfig, parseBenchConfig, type BenchConfig } from "./config/config.js";
export { FixtureError, ToolchainMissingError, isRunAbort } from "./errors.js";
export { discoverFixtures, loadFixture, type Fixture } from "./fixtures/loadFixture.js";
export type { BenchCategory, ValidationSpec } from "./fixtures/schema.js";
export { ModelError, getProviderFromConfig, type LlmProvider } from "./llm/index.js";
export { OllamaProvider } from "./llm/providers/ollama.js";
export { saveResults } from "./results/store.js";
export { runCmd, type CmdRunner } from "./runner/runCmd.js";
export { createValidationPipeline, type ValidationReport } from "./validation/pipeline/graph.js";
export { computeFinalScore } from "./validation/scoring.js";
