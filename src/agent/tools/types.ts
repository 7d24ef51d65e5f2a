import type { CompilationResult } from "../../validation/types.js";

export type ToolErrorCode = "NotFound" | "PathEscape" | "WriteDenied" | "NotADirectory" | "IoError";

export type ToolPayload =
  | { kind: "content"; path: string; text: string }
  | { kind: "listing"; directory: string; files: string[] }
  | { kind: "written"; path: string; bytes: number }
  | { kind: "compilation"; result: CompilationResult };

export type ToolResult =
  | { ok: true; payload: ToolPayload; message: string }
  | { ok: false; code: ToolErrorCode; message: string };

export type ToolRegistry = {
  readonly projectRoot: string;
  readonly writablePath: string;
  read(path: string): Promise<ToolResult>;
  write(path: string, content: string): Promise<ToolResult>;
  list(directory?: string): Promise<ToolResult>;
  compile(): Promise<ToolResult>;
};
