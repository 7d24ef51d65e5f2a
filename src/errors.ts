import { AgentAbortedError } from "./agent/errors.js";
import { ModelError } from "./llm/errors.js";

/** The compiler (or the node binary behind the SFC parser) could not be started. */
export class ToolchainMissingError extends Error {
  readonly command: string;

  constructor(command: string, detail: string) {
    super(`Toolchain missing: could not start '${command}' (${detail})`);
    this.name = "ToolchainMissingError";
    this.command = command;
  }
}

export class FixtureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FixtureError";
  }
}

/**
 * Errors that end a run before a BenchmarkResult can be built. Reports must keep these apart
 * from a legitimately low score.
 */
export const isRunAbort = (error: unknown): boolean =>
  error instanceof ModelError ||
  error instanceof ToolchainMissingError ||
  error instanceof FixtureError ||
  error instanceof AgentAbortedError;

export const errorMessage = (error: unknown, fallback = "unknown error"): string =>
  error instanceof Error ? error.message : typeof error === "string" ? error : fallback;
