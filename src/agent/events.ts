import type { ParseFailureKind } from "./parser.js";
import type { ToolName } from "./tools/specs.js";

export type AgentEvent =
  | { type: "step_start"; step: number; maxSteps: number }
  | { type: "tool_start"; step: number; name: ToolName }
  | { type: "tool_end"; step: number; name: ToolName; ok: boolean; note?: string }
  | { type: "parse_failed"; step: number; kind: ParseFailureKind; reason: string }
  | { type: "finished"; steps: number; summary?: string }
  | { type: "max_steps"; steps: number }
  | { type: "aborted"; steps: number; message: string };

export type AgentEventSink = (event: AgentEvent) => void;
