import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export const DEFAULT_SCORING = { compilation: 0.6, pattern_match: 0.3, naming: 0.1 };

/** Writes `<tmp>/<category>/<name>/{prompt.md,validation_spec.json,target_project/...}`. */
export const createFixtureDir = async (args: {
  category: string;
  name?: string;
  prompt: string;
  spec: Record<string, unknown>;
  files: Record<string, string | Buffer>;
}): Promise<string> => {
  const root = await mkdtemp(join(tmpdir(), "vuebench-fixtures-"));
  const dir = join(root, args.category, args.name ?? "sample");
  const project = join(dir, "target_project");
  await mkdir(project, { recursive: true });
  await writeFile(join(dir, "prompt.md"), args.prompt);
  await writeFile(join(dir, "validation_spec.json"), JSON.stringify(args.spec, null, 2));
  await writeFile(join(project, "package.json"), JSON.stringify({ name: "target", scripts: { "type-check": "vue-tsc --noEmit" } }));
  for (const [path, content] of Object.entries(args.files)) {
    await mkdir(dirname(join(project, path)), { recursive: true });
    await writeFile(join(project, path), content);
  }
  return dir;
};
