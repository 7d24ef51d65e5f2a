import { readFile, readdir, stat } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { FixtureError } from "../errors.js";
import { relativeInside } from "../agent/tools/registry.js";
import type { ValidationRequirements } from "../validation/pipeline/state.js";
import { BENCH_CATEGORIES, benchCategorySchema, validationSpecSchema, type BenchCategory, type ValidationSpec } from "./schema.js";

export type Fixture = {
  name: string;
  dir: string;
  category: BenchCategory;
  prompt: string;
  spec: ValidationSpec;
  projectRoot: string;
  /** posix path relative to projectRoot */
  targetFile: string;
  targetPath: string;
};

const exists = async (path: string): Promise<boolean> => {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return false;
    throw error;
  }
};

const requirePath = async (path: string, label: string): Promise<void> => {
  if (!(await exists(path))) {
    throw new FixtureError(`${label} not found: ${path}`);
  }
};

export const parseValidationSpec = (raw: unknown, source: string): ValidationSpec => {
  const parsed = validationSpecSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
    throw new FixtureError(`Invalid ${source}: ${detail}`);
  }
  return parsed.data;
};

const resolveCategory = (spec: ValidationSpec, dir: string): BenchCategory => {
  if (spec.category) return spec.category;
  const parent = benchCategorySchema.safeParse(basename(dirname(dir)));
  if (!parent.success) {
    throw new FixtureError(`Cannot infer category for ${dir}; set "category" in validation_spec.json`);
  }
  return parent.data;
};

export const loadFixture = async (fixtureDir: string): Promise<Fixture> => {
  const dir = resolve(fixtureDir);
  const promptPath = join(dir, "prompt.md");
  const specPath = join(dir, "validation_spec.json");
  const projectRoot = join(dir, "target_project");

  await requirePath(promptPath, "prompt.md");
  await requirePath(specPath, "validation_spec.json");
  await requirePath(projectRoot, "target_project");

  const prompt = await readFile(promptPath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(specPath, "utf8"));
  } catch (error) {
    throw new FixtureError(`validation_spec.json is not valid JSON: ${error instanceof Error ? error.message : "parse failed"}`);
  }
  const spec = parseValidationSpec(raw, specPath);

  const targetFile = relativeInside(projectRoot, spec.target_file);
  if (targetFile === null || targetFile === "") {
    throw new FixtureError(`target_file must point inside target_project: ${spec.target_file}`);
  }
  const targetPath = join(projectRoot, targetFile);
  await requirePath(targetPath, "Target file");

  return {
    name: basename(dir),
    dir,
    category: resolveCategory(spec, dir),
    prompt,
    spec,
    projectRoot,
    targetFile,
    targetPath
  };
};

export const requirementsOf = (spec: ValidationSpec): ValidationRequirements => ({
  patterns: spec.required_patterns,
  naming: spec.naming_conventions,
  weights: spec.scoring
});

/** Fixture directories laid out as `<root>/<category>/<name>/validation_spec.json`. */
export const discoverFixtures = async (root: string): Promise<string[]> => {
  const found: string[] = [];
  for (const category of BENCH_CATEGORIES) {
    const categoryDir = join(resolve(root), category);
    if (!(await exists(categoryDir))) continue;
    const entries = await readdir(categoryDir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory() && (await exists(join(categoryDir, entry.name, "validation_spec.json")))) {
        found.push(join(categoryDir, entry.name));
      }
    }
  }
  return found.sort((a, b) => a.localeCompare(b));
};
