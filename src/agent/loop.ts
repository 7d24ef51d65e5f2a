import { errorMessage, isRunAbort } from "../errors.js";
import type { LlmMessage, LlmProvider } from "../llm/provider.js";
import { AgentAbortedError } from "./errors.js";
import type { AgentEventSink } from "./events.js";
import { parseToolCall } from "./parser.js";
import { buildAgentSystemPrompt, buildCorrection } from "./prompts.js";
import { renderToolResult } from "./tools/render.js";
import type { ToolCall } from "./tools/specs.js";
import type { ToolRegistry, ToolResult } from "./tools/types.js";
import { Transcript, type AgentStep } from "./transcript.js";

export type AgentStatus = "Succeeded" | "MaxStepsExceeded" | "UnrecoverableError";

export type AgentOutcome = {
  status: Exclude<AgentStatus, "UnrecoverableError">;
  steps: readonly AgentStep[];
  stepCount: number;
  compileAttempts: number;
  finalContent: string;
  summary?: string;
  outputTokens: number;
  modelDurationMs: number;
};

type ActionCall = Exclude<ToolCall, { name: "finish" }>;

const executeTool = (registry: ToolRegistry, call: ActionCall): Promise<ToolResult> => {
  switch (call.name) {
    case "read_file":
      return registry.read(call.arguments.path);
    case "write_file":
      return registry.write(call.arguments.path, call.arguments.content);
    case "list_files":
      return registry.list(call.arguments.directory);
    case "run_compilation":
      return registry.compile();
  }
};

const firstLine = (value: string): string => value.split("\n")[0] ?? "";

const readFinalContent = async (registry: ToolRegistry): Promise<string> => {
  const result = await registry.read(registry.writablePath);
  return result.ok && result.payload.kind === "content" ? result.payload.text : "";
};

/**
 * Drives the model through tool calls until it calls `finish` or the step budget runs out.
 * Every model turn, parsed or not, consumes one step. Transport failures and a missing
 * toolchain end the run with `AgentAbortedError`.
 */
export const runAgentLoop = async (args: {
  provider: LlmProvider;
  model: string;
  registry: ToolRegistry;
  taskPrompt: string;
  maxSteps: number;
  systemPrompt?: string;
  timeoutMs?: number;
  onEvent?: AgentEventSink;
  now?: () => Date;
}): Promise<AgentOutcome> => {
  if (!Number.isInteger(args.maxSteps) || args.maxSteps < 1) {
    throw new RangeError(`maxSteps must be a positive integer, got ${args.maxSteps}`);
  }

  const now = args.now ?? (() => new Date());
  const emit: AgentEventSink = (event) => args.onEvent?.(event);
  const transcript = new Transcript();

  let conversation: readonly LlmMessage[] = [
    { role: "system", content: args.systemPrompt ?? buildAgentSystemPrompt({ writablePath: args.registry.writablePath }) },
    { role: "user", content: args.taskPrompt }
  ];
  let compileAttempts = 0;
  let outputTokens = 0;
  let modelDurationMs = 0;
  let status: AgentOutcome["status"] = "MaxStepsExceeded";
  let summary: string | undefined;

  while (transcript.length < args.maxSteps) {
    const step = transcript.length + 1;
    emit({ type: "step_start", step, maxSteps: args.maxSteps });

    try {
      const reply = await args.provider.complete(conversation, { model: args.model, timeoutMs: args.timeoutMs });
      outputTokens += reply.outputTokens;
      modelDurationMs += reply.durationMs;

      const parsed = parseToolCall(reply.text);
      if (!parsed.ok) {
        transcript.append({ rawText: reply.text, call: null, failure: parsed.failure, result: null, timestamp: now().toISOString() });
        emit({ type: "parse_failed", step, kind: parsed.failure.kind, reason: parsed.failure.reason });
        conversation = [
          ...conversation,
          { role: "assistant", content: reply.text },
          { role: "user", content: buildCorrection(parsed.failure.reason) }
        ];
        continue;
      }

      const call = parsed.call;
      if (call.name === "finish") {
        transcript.append({ rawText: reply.text, call, failure: null, result: null, timestamp: now().toISOString() });
        status = "Succeeded";
        summary = call.arguments.summary;
        emit({ type: "finished", steps: transcript.length, summary });
        break;
      }

      emit({ type: "tool_start", step, name: call.name });
      if (call.name === "run_compilation") {
        compileAttempts += 1;
      }
      const result = await executeTool(args.registry, call);
      transcript.append({ rawText: reply.text, call, failure: null, result, timestamp: now().toISOString() });
      emit({
        type: "tool_end",
        step,
        name: call.name,
        ok: result.ok,
        note: result.ok ? firstLine(result.message) : `${result.code}: ${firstLine(result.message)}`
      });
      conversation = [
        ...conversation,
        { role: "assistant", content: reply.text },
        { role: "user", content: renderToolResult(call.name, result) }
      ];
    } catch (error) {
      if (!isRunAbort(error)) {
        throw error;
      }
      const message = errorMessage(error);
      emit({ type: "aborted", steps: transcript.length, message });
      throw new AgentAbortedError(`Agent run aborted at step ${step}: ${message}`, transcript.snapshot(), { cause: error });
    }
  }

  if (status === "MaxStepsExceeded") {
    emit({ type: "max_steps", steps: transcript.length });
  }

  return {
    status,
    steps: transcript.snapshot(),
    stepCount: transcript.length,
    compileAttempts,
    finalContent: await readFinalContent(args.registry),
    summary,
    outputTokens,
    modelDurationMs
  };
};
