import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import process from "node:process";
import { describe, expect, test } from "vitest";
import { FixtureError } from "../src/errors.js";
import { runCmd } from "../src/runner/runCmd.js";
import { parseCompilerOutput, runCompilation, toCompilationResult } from "../src/validation/compilation.js";
import { createFakeProject, recordingRunner } from "./helpers/fakeProject.js";

describe("compiler output", () => {
  test("splits error and warning lines", () => {
    const stdout = [
      "> target@0.0.0 type-check",
      "src/App.vue(3,7): error TS2322: Type 'string' is not assignable to type 'number'.",
      "src/main.ts:1:1 - error TS1005: ';' expected.",
      ""
    ].join("\n");
    const stderr = "npm WARN config production Use `--omit=dev` instead.\nnpm WARN config production Use `--omit=dev` instead.\n";

    expect(parseCompilerOutput(stdout, stderr)).toEqual({
      errors: [
        "src/App.vue(3,7): error TS2322: Type 'string' is not assignable to type 'number'.",
        "src/main.ts:1:1 - error TS1005: ';' expected."
      ],
      warnings: ["npm WARN config production Use `--omit=dev` instead."]
    });
  });

  test("a timeout yields exactly one synthetic message", () => {
    const result = toCompilationResult(
      { ok: false, code: 1, stdout: "src/App.vue(1,1): error TS1000: partial", stderr: "", timedOut: true },
      60.2,
      60_000
    );
    expect(result).toEqual({
      success: false,
      errors: ["Compilation timed out after 60 seconds"],
      warnings: [],
      durationSec: 60.2,
      timedOut: true
    });
  });
});

describe("runCompilation", () => {
  test("requires a package.json in the target project", async () => {
    const root = await mkdtemp(join(tmpdir(), "vuebench-empty-"));
    const { runCmdImpl, calls } = recordingRunner({ ok: true, code: 0, stdout: "", stderr: "" });

    await expect(runCompilation({ projectRoot: root, runCmdImpl })).rejects.toBeInstanceOf(FixtureError);
    expect(calls).toHaveLength(0);
  });

  test("passes the default timeout to the runner", async () => {
    const root = await createFakeProject({});
    const { runCmdImpl, calls } = recordingRunner({ ok: true, code: 0, stdout: "", stderr: "" });

    const result = await runCompilation({ projectRoot: root, runCmdImpl });
    expect(result.success).toBe(true);
    expect(calls[0]?.timeoutMs).toBe(60_000);
  });
});

describe("runCmd", () => {
  test("kills a command that outlives its timeout", async () => {
    const started = Date.now();
    const result = await runCmd(process.execPath, ["-e", "setTimeout(() => {}, 10000)"], tmpdir(), { timeoutMs: 200 });

    expect(result.timedOut).toBe(true);
    expect(result.ok).toBe(false);
    expect(Date.now() - started).toBeLessThan(5000);
  });

  test("reports a command that cannot start", async () => {
    const result = await runCmd("vuebench-no-such-binary", [], tmpdir(), { timeoutMs: 1000 });
    expect(result.ok).toBe(false);
    expect(result.spawnError).toBe("ENOENT");
  });

  test("captures output of a finished command", async () => {
    const result = await runCmd(process.execPath, ["-e", "process.stdout.write('hello')"], tmpdir());
    expect(result).toMatchObject({ ok: true, code: 0, stdout: "hello", timedOut: false });
  });
});
