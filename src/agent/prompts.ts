import { TOOL_SPECS, type ToolSpec } from "./tools/specs.js";

const renderTool = (tool: ToolSpec): string => {
  const params = tool.parameters.map((param) => {
    const flag = param.required ? "" : "?";
    const note = param.description ? ` - ${param.description}` : "";
    return `    ${param.name}${flag}: ${param.type}${note}`;
  });
  return [`- ${tool.name}: ${tool.description}`, ...params].join("\n");
};

export const TOOL_CALL_FORMAT = [
  "Respond with exactly one JSON code block per message:",
  "```json",
  '{"name": "<tool name>", "arguments": {"<param>": "<value>"}}',
  "```",
  "Text outside the block is ignored."
].join("\n");

export const buildAgentSystemPrompt = (args: { writablePath: string }): string =>
  [
    "You are a coding agent working inside a Vue 3 + TypeScript project.",
    `You may only modify ${args.writablePath}. Read other files as needed.`,
    "Use run_compilation to check your fix, then call finish.",
    "",
    "Tools:",
    ...TOOL_SPECS.map(renderTool),
    "",
    TOOL_CALL_FORMAT
  ].join("\n");

export const buildCorrection = (reason: string): string =>
  `Your last message could not be parsed as a tool call (${reason}). Respond with exactly one JSON code block.`;

export const ORIGINAL_CODE_PLACEHOLDER = "{{original_code}}";

export const renderSingleShotPrompt = (template: string, originalCode: string): string =>
  template.split(ORIGINAL_CODE_PLACEHOLDER).join(originalCode);
