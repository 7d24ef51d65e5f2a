import { existsSync } from "node:fs";
import { join } from "node:path";
import { FixtureError, ToolchainMissingError } from "../errors.js";
import type { CmdResult, CmdRunner } from "../runner/runCmd.js";
import type { CompilationResult } from "./types.js";

export const DEFAULT_COMPILE_TIMEOUT_MS = 60_000;

const isErrorLine = (line: string): boolean => line.includes("error TS") || line.includes(" - error");

/** vue-tsc writes diagnostics to stdout, npm to stderr; both are scanned. */
export const parseCompilerOutput = (stdout: string, stderr: string): { errors: string[]; warnings: string[] } => {
  const errors: string[] = [];
  const warnings: string[] = [];
  `${stdout}\n${stderr}`.split(/\r?\n/).forEach((raw) => {
    const line = raw.trim();
    if (line.length === 0) return;
    if (isErrorLine(line)) {
      errors.push(line);
    } else if (line.toLowerCase().includes("warning") && !warnings.includes(line)) {
      warnings.push(line);
    }
  });
  return { errors, warnings };
};

export const timeoutMessage = (timeoutMs: number): string =>
  `Compilation timed out after ${Math.round(timeoutMs / 1000)} seconds`;

export const toCompilationResult = (result: CmdResult, durationSec: number, timeoutMs: number): CompilationResult => {
  if (result.timedOut) {
    return { success: false, errors: [timeoutMessage(timeoutMs)], warnings: [], durationSec, timedOut: true };
  }
  const { errors, warnings } = parseCompilerOutput(result.stdout, result.stderr);
  return { success: result.ok, errors, warnings, durationSec, timedOut: false };
};

/** Runs `npm run type-check` in the target project. */
export const runCompilation = async (args: {
  projectRoot: string;
  runCmdImpl: CmdRunner;
  timeoutMs?: number;
}): Promise<CompilationResult> => {
  if (!existsSync(args.projectRoot)) {
    throw new FixtureError(`Target project not found: ${args.projectRoot}`);
  }
  if (!existsSync(join(args.projectRoot, "package.json"))) {
    throw new FixtureError(`package.json not found in ${args.projectRoot}`);
  }

  const timeoutMs = args.timeoutMs ?? DEFAULT_COMPILE_TIMEOUT_MS;
  const started = Date.now();
  const result = await args.runCmdImpl("npm", ["run", "type-check"], args.projectRoot, { timeoutMs });
  const durationSec = (Date.now() - started) / 1000;

  if (result.spawnError) {
    throw new ToolchainMissingError("npm", result.spawnError);
  }
  return toCompilationResult(result, durationSec, timeoutMs);
};
