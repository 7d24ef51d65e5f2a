import type { ToolName } from "./specs.js";
import type { ToolResult } from "./types.js";

/** Text the model sees as the tool-result turn. */
export const renderToolResult = (name: ToolName, result: ToolResult): string => {
  if (!result.ok) {
    return `Tool ${name} failed [${result.code}]: ${result.message}`;
  }

  const payload = result.payload;
  switch (payload.kind) {
    case "content":
      return `Contents of ${payload.path}:\n${payload.text}`;
    case "listing":
      return payload.files.length === 0
        ? `No files under ${payload.directory}.`
        : `Files under ${payload.directory}:\n${payload.files.join("\n")}`;
    case "written":
      return result.message;
    case "compilation":
      return result.message;
  }
};
