import type { ParseFailure } from "./parser.js";
import type { ToolCall } from "./tools/specs.js";
import type { ToolResult } from "./tools/types.js";

export type AgentStep = {
  index: number;
  rawText: string;
  call: ToolCall | null;
  failure: ParseFailure | null;
  result: ToolResult | null;
  timestamp: string;
};

/** Append-only step log owned by one loop run. */
export class Transcript {
  private readonly steps: AgentStep[] = [];

  append(step: Omit<AgentStep, "index">): AgentStep {
    const entry = Object.freeze({ ...step, index: this.steps.length });
    this.steps.push(entry);
    return entry;
  }

  get length(): number {
    return this.steps.length;
  }

  snapshot(): readonly AgentStep[] {
    return [...this.steps];
  }
}
