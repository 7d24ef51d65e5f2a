import type { AgentStep } from "./transcript.js";

/** The loop could not continue (model transport or missing toolchain). Carries the partial log. */
export class AgentAbortedError extends Error {
  readonly steps: readonly AgentStep[];

  constructor(message: string, steps: readonly AgentStep[], options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentAbortedError";
    this.steps = steps;
  }
}
