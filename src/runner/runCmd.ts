import { spawn } from "node:child_process";
import process from "node:process";

export type CmdResult = {
  ok: boolean;
  code: number;
  stdout: string;
  stderr: string;
  timedOut?: boolean;
  /** errno code when the process could not be started, e.g. "ENOENT" */
  spawnError?: string;
};

export type RunCmdOptions = {
  timeoutMs?: number;
};

export type CmdRunner = (cmd: string, args: string[], cwd: string, opts?: RunCmdOptions) => Promise<CmdResult>;

const clamp = (value: string, max = 200000): string =>
  value.length > max ? `${value.slice(0, max)}...<truncated>` : value;

export const DEFAULT_TIMEOUT_MS = 120_000;

const errnoCode = (error: Error): string =>
  "code" in error && typeof error.code === "string" ? error.code : "UNKNOWN";

export const runCmd: CmdRunner = async (cmd, args, cwd, opts) =>
  new Promise((resolve) => {
    const timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    // own process group so a timeout also takes down grandchildren (npm -> sh -> vue-tsc)
    const detached = process.platform !== "win32";
    const child = spawn(cmd, args, { cwd, shell: false, detached });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const finish = (result: CmdResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const timer = setTimeout(() => {
      timedOut = true;
      stderr += `\ncommand timed out after ${timeoutMs}ms`;
      try {
        if (detached && child.pid !== undefined) {
          process.kill(-child.pid, "SIGKILL");
        } else {
          child.kill("SIGKILL");
        }
      } catch {
        child.kill("SIGKILL");
      }
    }, timeoutMs);

    child.stdout.on("data", (chunk) => {
      stdout += String(chunk);
    });

    child.stderr.on("data", (chunk) => {
      stderr += String(chunk);
    });

    child.on("close", (code) => {
      const finalCode = code ?? 1;
      finish({
        ok: finalCode === 0 && !timedOut,
        code: finalCode,
        stdout: clamp(stdout),
        stderr: clamp(stderr),
        timedOut
      });
    });

    child.on("error", (error) => {
      finish({
        ok: false,
        code: 1,
        stdout: clamp(stdout),
        stderr: clamp(`${stderr}\n${error.message}`),
        timedOut,
        spawnError: errnoCode(error)
      });
    });
  });
