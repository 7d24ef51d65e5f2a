import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, extname, join, resolve } from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ToolchainMissingError } from "../errors.js";
import type { CmdRunner } from "../runner/runCmd.js";
import type { AstParser, SfcFacts } from "./types.js";

export const DEFAULT_AST_TIMEOUT_MS = 10_000;

const here = fileURLToPath(import.meta.url);
const parserScript = join(dirname(here), `parseSfcCli${extname(here)}`);
const packageRoot = resolve(dirname(here), "..", "..");

export const parserOutputSchema = z.object({
  has_script_lang_ts: z.boolean(),
  script_lang: z.string().nullable().default(null),
  interfaces: z.array(z.string()),
  type_annotations: z.array(z.string()),
  imports: z.array(z.object({ source: z.string(), isTypeOnly: z.boolean() })),
  variables: z.array(z.string()).default([])
});

const parserErrorSchema = z.object({ error: z.string() });

const tryJson = (text: string): unknown => {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
};

export const decodeParserOutput = (stdout: string): SfcFacts => {
  const raw = tryJson(stdout);
  if (raw === undefined) {
    throw new Error(`Failed to parse AST output as JSON: ${stdout.slice(0, 500)}`);
  }
  const parsed = parserOutputSchema.parse(raw);
  return {
    hasScriptLangTs: parsed.has_script_lang_ts,
    scriptLang: parsed.script_lang,
    interfaces: parsed.interfaces,
    typeAnnotations: parsed.type_annotations,
    imports: parsed.imports,
    variables: parsed.variables
  };
};

export const describeParserFailure = (stderr: string, code: number): string => {
  const trimmed = stderr.trim();
  if (!trimmed) return `AST parser returned non-zero exit code: ${code}`;
  const lastLine = trimmed.split(/\r?\n/).pop() ?? trimmed;
  const parsed = parserErrorSchema.safeParse(tryJson(lastLine));
  if (parsed.success) return `AST parsing failed: ${parsed.data.error}`;
  return `AST parsing failed: ${trimmed.slice(0, 1000)}`;
};

/**
 * SFC parser running in a child process, so a crash or hang on a malformed component cannot
 * take the benchmark down. Running from TypeScript sources loads the script through tsx.
 */
export const createSubprocessAstParser = (args: { runCmdImpl: CmdRunner; timeoutMs?: number }): AstParser => {
  const timeoutMs = args.timeoutMs ?? DEFAULT_AST_TIMEOUT_MS;
  const loaderArgs = parserScript.endsWith(".ts") ? ["--import", "tsx"] : [];

  return async (code: string): Promise<SfcFacts> => {
    const dir = await mkdtemp(join(tmpdir(), "vuebench-ast-"));
    const file = join(dir, "Candidate.vue");
    try {
      await writeFile(file, code, "utf8");
      const result = await args.runCmdImpl(process.execPath, [...loaderArgs, parserScript, file], packageRoot, {
        timeoutMs
      });
      if (result.spawnError) {
        throw new ToolchainMissingError(process.execPath, result.spawnError);
      }
      if (result.timedOut) {
        throw new Error(`AST parser timed out after ${timeoutMs}ms`);
      }
      if (!result.ok) {
        throw new Error(describeParserFailure(result.stderr, result.code));
      }
      return decodeParserOutput(result.stdout);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  };
};
