import { mkdir, readFile, readdir, realpath, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { errorMessage } from "../../errors.js";
import type { CmdRunner } from "../../runner/runCmd.js";
import { runCompilation } from "../../validation/compilation.js";
import type { ToolErrorCode, ToolRegistry, ToolResult } from "./types.js";

export const EXCLUDED_DIRS = new Set(["node_modules", ".git", "dist"]);

const fail = (code: ToolErrorCode, message: string): ToolResult => ({ ok: false, code, message });

const errnoOf = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;

/** Project-relative posix path, or null when `value` resolves outside `root`. */
export const relativeInside = (root: string, value: string): string | null => {
  const abs = isAbsolute(value) ? resolve(value) : resolve(root, value);
  const rel = relative(resolve(root), abs);
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }
  return rel.split(sep).join("/");
};

/** Follows symlinks before the containment check. A path that does not exist yet passes. */
const resolvesInside = async (root: string, full: string): Promise<boolean> => {
  try {
    return relativeInside(await realpath(root), await realpath(full)) !== null;
  } catch (error) {
    if (errnoOf(error) === "ENOENT") return true;
    throw error;
  }
};

const listFiles = async (root: string, start: string): Promise<string[]> => {
  const stack = [start];
  const out: string[] = [];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    const entries = await readdir(current, { withFileTypes: true });
    entries.forEach((entry) => {
      const full = join(current, entry.name);
      if (entry.isDirectory()) {
        if (!EXCLUDED_DIRS.has(entry.name)) stack.push(full);
      } else if (entry.isFile()) {
        out.push(relative(root, full).split(sep).join("/"));
      }
    });
  }

  return out.sort((a, b) => a.localeCompare(b));
};

/**
 * Binds read/write/list/compile to one project root. Only `writablePath` may be written.
 * Resource problems come back as error results for the model; a missing compiler toolchain
 * is thrown.
 */
export const createToolRegistry = (args: {
  projectRoot: string;
  writablePath: string;
  runCmdImpl: CmdRunner;
  compileTimeoutMs?: number;
}): ToolRegistry => {
  const root = resolve(args.projectRoot);
  const writable = relativeInside(root, args.writablePath);
  if (writable === null || writable === "") {
    throw new Error(`Writable path must be a file inside the project: ${args.writablePath}`);
  }

  const read = async (path: string): Promise<ToolResult> => {
    const rel = relativeInside(root, path);
    if (rel === null) return fail("PathEscape", `Path '${path}' is outside the project directory.`);
    try {
      const full = join(root, rel);
      if (!(await resolvesInside(root, full))) {
        return fail("PathEscape", `Path '${path}' is outside the project directory.`);
      }
      const text = await readFile(full, "utf8");
      return { ok: true, payload: { kind: "content", path: rel, text }, message: `Read ${rel} (${text.length} chars)` };
    } catch (error) {
      const code = errnoOf(error);
      if (code === "ENOENT") return fail("NotFound", `File not found: ${path}`);
      if (code === "EISDIR") return fail("IoError", `'${path}' is a directory, not a file.`);
      return fail("IoError", errorMessage(error, "read failed"));
    }
  };

  const write = async (path: string, content: string): Promise<ToolResult> => {
    const rel = relativeInside(root, path);
    if (rel !== writable) {
      return fail("WriteDenied", `Writing to '${path}' is not permitted. Allowed: ${writable}`);
    }
    try {
      const full = join(root, rel);
      if (!(await resolvesInside(root, full))) {
        return fail("WriteDenied", `Writing to '${path}' is not permitted. Allowed: ${writable}`);
      }
      await mkdir(dirname(full), { recursive: true });
      await writeFile(full, content, "utf8");
      const bytes = Buffer.byteLength(content, "utf8");
      return { ok: true, payload: { kind: "written", path: rel, bytes }, message: `Wrote ${bytes} bytes to ${rel}` };
    } catch (error) {
      return fail("IoError", errorMessage(error, "write failed"));
    }
  };

  const list = async (directory = "."): Promise<ToolResult> => {
    const rel = relativeInside(root, directory);
    if (rel === null) return fail("PathEscape", `Path '${directory}' is outside the project directory.`);
    const full = join(root, rel);
    try {
      if (!(await resolvesInside(root, full))) {
        return fail("PathEscape", `Path '${directory}' is outside the project directory.`);
      }
      const info = await stat(full);
      if (!info.isDirectory()) return fail("NotADirectory", `'${directory}' is not a directory.`);
      const files = await listFiles(root, full);
      return {
        ok: true,
        payload: { kind: "listing", directory: rel === "" ? "." : rel, files },
        message: `${files.length} files`
      };
    } catch (error) {
      if (errnoOf(error) === "ENOENT") return fail("NotFound", `Directory not found: ${directory}`);
      return fail("IoError", errorMessage(error, "list failed"));
    }
  };

  const compile = async (): Promise<ToolResult> => {
    const result = await runCompilation({
      projectRoot: root,
      runCmdImpl: args.runCmdImpl,
      timeoutMs: args.compileTimeoutMs
    });
    const message = result.success
      ? "Compilation succeeded."
      : result.errors.length > 0
        ? result.errors.join("\n")
        : "Compilation failed without TypeScript diagnostics.";
    return { ok: true, payload: { kind: "compilation", result }, message };
  };

  return { projectRoot: root, writablePath: writable, read, write, list, compile };
};
