import type { z } from "zod";
import { TOOL_NAMES, isToolName, toolSchemas, type ToolCall } from "./tools/specs.js";

export type ParseFailureKind = "MalformedToolCall" | "UnknownTool" | "InvalidArguments";

export type ParseFailure = { kind: ParseFailureKind; reason: string };

export type ParseResult = { ok: true; call: ToolCall } | { ok: false; failure: ParseFailure };

const malformed = (reason: string): ParseResult => ({ ok: false, failure: { kind: "MalformedToolCall", reason } });

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "arguments"}: ${issue.message}`).join("; ");

const invalid = (name: string, error: z.ZodError): ParseResult => ({
  ok: false,
  failure: { kind: "InvalidArguments", reason: `invalid arguments for ${name}: ${formatIssues(error)}` }
});

// fences own their line; a JSON string cannot hold a raw newline
const FENCE_LINE = /^[ \t]*```[\w+-]*[ \t]*$/;

/** Body of the single fenced block, or a failure when there is not exactly one closed block. */
const extractBlock = (text: string): { ok: true; body: string } | { ok: false; reason: string } => {
  const blocks: string[][] = [];
  let open: string[] | null = null;

  for (const line of text.split(/\r?\n/)) {
    if (FENCE_LINE.test(line)) {
      if (open === null) {
        open = [];
      } else {
        blocks.push(open);
        open = null;
      }
      continue;
    }
    open?.push(line);
  }

  if (open !== null) return { ok: false, reason: "unterminated code fence" };
  const [first] = blocks;
  if (first === undefined) return { ok: false, reason: "no fenced code block found" };
  if (blocks.length > 1) return { ok: false, reason: `expected exactly one code block, found ${blocks.length}` };
  return { ok: true, body: first.join("\n") };
};

const decodeJson = (body: string): { ok: true; value: unknown } | { ok: false; reason: string } => {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${error instanceof Error ? error.message : "parse failed"}` };
  }
};

const bindArguments = (name: ToolCall["name"], args: unknown): ParseResult => {
  switch (name) {
    case "read_file": {
      const parsed = toolSchemas.read_file.safeParse(args);
      return parsed.success ? { ok: true, call: { name, arguments: parsed.data } } : invalid(name, parsed.error);
    }
    case "write_file": {
      const parsed = toolSchemas.write_file.safeParse(args);
      return parsed.success ? { ok: true, call: { name, arguments: parsed.data } } : invalid(name, parsed.error);
    }
    case "list_files": {
      const parsed = toolSchemas.list_files.safeParse(args);
      return parsed.success ? { ok: true, call: { name, arguments: parsed.data } } : invalid(name, parsed.error);
    }
    case "run_compilation": {
      const parsed = toolSchemas.run_compilation.safeParse(args);
      return parsed.success ? { ok: true, call: { name, arguments: parsed.data } } : invalid(name, parsed.error);
    }
    case "finish": {
      const parsed = toolSchemas.finish.safeParse(args);
      return parsed.success ? { ok: true, call: { name, arguments: parsed.data } } : invalid(name, parsed.error);
    }
  }
};

/**
 * Reads one tool call out of a model turn. Prose around the block is ignored. Never throws;
 * every rejection comes back as a typed failure.
 */
export const parseToolCall = (text: string): ParseResult => {
  const block = extractBlock(text);
  if (!block.ok) return malformed(block.reason);

  const decoded = decodeJson(block.body);
  if (!decoded.ok) return malformed(decoded.reason);

  const value = decoded.value;
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return malformed("tool call must be a JSON object");
  }
  if (!("name" in value) || typeof value.name !== "string") {
    return malformed("tool call is missing a string 'name'");
  }
  if (!isToolName(value.name)) {
    return {
      ok: false,
      failure: {
        kind: "UnknownTool",
        reason: `unknown tool '${value.name}'; valid tools: ${TOOL_NAMES.join(", ")}`
      }
    };
  }

  return bindArguments(value.name, "arguments" in value ? value.arguments : {});
};
