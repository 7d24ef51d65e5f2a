import type { AgentEvent } from "../agent/events.js";
import type { BenchCategory } from "../fixtures/schema.js";
import type { BenchmarkResult } from "./types.js";

export type BenchEvent =
  | { type: "run_start"; fixture: string; category: BenchCategory; runNumber: number; totalRuns: number }
  | { type: "generating"; fixture: string; runNumber: number }
  | { type: "validating"; fixture: string; runNumber: number }
  | { type: "agent"; fixture: string; runNumber: number; event: AgentEvent }
  | { type: "run_done"; result: BenchmarkResult }
  | { type: "run_aborted"; fixture: string; runNumber: number; message: string };

export type BenchEventSink = (event: BenchEvent) => void;
