import { z } from "zod";

const read_file = z.object({
  path: z.string().min(1).describe("Path relative to the project root, e.g. 'src/components/UserCard.vue'")
});

const write_file = z.object({
  path: z.string().min(1).describe("Path relative to the project root; only the task's target file is writable"),
  content: z.string().describe("Complete new file content")
});

const list_files = z.object({
  directory: z.string().min(1).default(".").describe("Directory relative to the project root")
});

const run_compilation = z.object({});

const finish = z.object({
  summary: z.string().optional().describe("Short description of what was changed")
});

export const toolSchemas = { read_file, write_file, list_files, run_compilation, finish };

export type ToolName = keyof typeof toolSchemas;

export const TOOL_NAMES: readonly ToolName[] = ["read_file", "write_file", "list_files", "run_compilation", "finish"];

export const isToolName = (value: string): value is ToolName => Object.prototype.hasOwnProperty.call(toolSchemas, value);

/** Closed union over the fixed tool set; `arguments` is the schema's parsed output. */
export type ToolCall = {
  [K in ToolName]: { name: K; arguments: z.output<(typeof toolSchemas)[K]> };
}[ToolName];

export type ParamSpec = {
  name: string;
  type: "string" | "number" | "boolean";
  required: boolean;
  description?: string;
};

export type ToolSpec = {
  name: ToolName;
  description: string;
  parameters: readonly ParamSpec[];
};

const descriptions: Record<ToolName, string> = {
  read_file: "Read a file from the project.",
  write_file: "Overwrite a file in the project with new content.",
  list_files: "List files under a directory (recursive, excludes node_modules, .git and dist).",
  run_compilation: "Run the project's TypeScript type-check and return errors.",
  finish: "Signal that the task is complete. Call this once the fix compiles."
};

const unwrap = (schema: z.ZodTypeAny): z.ZodTypeAny => {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return unwrap(schema.unwrap());
  if (schema instanceof z.ZodDefault) return unwrap(schema.removeDefault());
  return schema;
};

const primitiveOf = (schema: z.ZodTypeAny): ParamSpec["type"] => {
  const inner = unwrap(schema);
  if (inner instanceof z.ZodNumber) return "number";
  if (inner instanceof z.ZodBoolean) return "boolean";
  return "string";
};

/** Ordered parameter list, derived from the zod shape for prompt rendering. */
export const describeParameters = (schema: z.AnyZodObject): ParamSpec[] =>
  Object.entries(schema.shape).flatMap(([name, value]) =>
    value instanceof z.ZodType
      ? [
          {
            name,
            type: primitiveOf(value),
            required: !value.isOptional(),
            description: value.description
          }
        ]
      : []
  );

export const TOOL_SPECS: readonly ToolSpec[] = TOOL_NAMES.map((name) => ({
  name,
  description: descriptions[name],
  parameters: describeParameters(toolSchemas[name])
}));
