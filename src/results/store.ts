import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { BenchmarkResult } from "../bench/types.js";

const slug = (value: string): string => value.replace(/[^A-Za-z0-9._-]+/g, "-");

export const resultsFileName = (model: string, fixture: string, at: Date): string =>
  `${slug(model)}_${slug(fixture)}_${at.toISOString().replace(/[:.]/g, "-")}.json`;

/** Writes one batch as a pretty JSON array and returns the file path. */
export const saveResults = async (
  results: readonly BenchmarkResult[],
  outDir: string,
  options: { now?: () => Date } = {}
): Promise<string> => {
  const first = results[0];
  if (!first) {
    throw new Error("saveResults called with no results");
  }
  const now = options.now ?? (() => new Date());
  await mkdir(outDir, { recursive: true });
  const filePath = join(outDir, resultsFileName(first.model, first.fixture, now()));
  await writeFile(filePath, `${JSON.stringify(results, null, 2)}\n`, "utf8");
  return filePath;
};
