import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

const unquote = (value: string): string => {
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
};

export const parseEnvLine = (line: string): { key: string; value: string } | null => {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#")) return null;

  const withoutExport = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed;
  const idx = withoutExport.indexOf("=");
  if (idx <= 0) return null;

  return {
    key: withoutExport.slice(0, idx).trim(),
    value: unquote(withoutExport.slice(idx + 1).trim())
  };
};

/**
 * Loads KEY=VALUE pairs into `env` without overriding variables that are already set.
 * Returns the keys that were actually applied.
 */
export const loadEnvFile = (filePath = ".env", env: NodeJS.ProcessEnv = process.env): string[] => {
  const absolute = resolve(process.cwd(), filePath);
  if (!existsSync(absolute)) return [];

  const applied: string[] = [];
  readFileSync(absolute, "utf8")
    .split(/\r?\n/)
    .forEach((line) => {
      const parsed = parseEnvLine(line);
      if (!parsed || env[parsed.key] !== undefined) return;
      env[parsed.key] = parsed.value;
      applied.push(parsed.key);
    });
  return applied;
};
