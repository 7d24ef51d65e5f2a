import type { PatternCategory, PatternResult, RequiredPatterns, SfcFacts } from "./types.js";

export const round2 = (value: number): number => Math.round(value * 100) / 100;

const hasAll = (required: string[], found: string[]): boolean =>
  required.length === 0 ? found.length > 0 : required.every((name) => found.includes(name));

const structuralChecks = (facts: SfcFacts, required: RequiredPatterns): Array<[PatternCategory, boolean]> => {
  const out: Array<[PatternCategory, boolean]> = [];
  if (required.interfaces !== undefined) {
    out.push(["interfaces", hasAll(required.interfaces, facts.interfaces)]);
  }
  if (required.type_annotations !== undefined) {
    out.push(["type_annotations", hasAll(required.type_annotations, facts.typeAnnotations)]);
  }
  if (required.imports !== undefined) {
    out.push(["imports", hasAll(required.imports, facts.imports.map((item) => item.source))]);
  }
  if (required.script_lang !== undefined) {
    out.push(["script_lang", facts.scriptLang === required.script_lang]);
  }
  return out;
};

/**
 * Scores the fraction of required categories present, scaled to 0..10 and rounded to two
 * decimals. Named source patterns are regular expressions matched against the raw component.
 * Throws on an invalid pattern.
 */
export const checkPatterns = (facts: SfcFacts, code: string, required: RequiredPatterns): PatternResult => {
  const results: Array<[string, boolean]> = [...structuralChecks(facts, required)];
  Object.entries(required.source_patterns ?? {}).forEach(([name, pattern]) => {
    results.push([name, new RegExp(pattern, "m").test(code)]);
  });

  const checks = Object.fromEntries(results);
  const missing = results.filter(([, ok]) => !ok).map(([name]) => name);
  const satisfied = results.length - missing.length;
  const score = results.length === 0 ? 10 : round2((10 * satisfied) / results.length);

  return { checks, missing, score };
};

export const emptyPatternResult = (required: RequiredPatterns, reason: string): PatternResult => {
  const names = [
    ...(["interfaces", "type_annotations", "imports", "script_lang"] as const).filter((key) => required[key] !== undefined),
    ...Object.keys(required.source_patterns ?? {})
  ];
  return {
    checks: Object.fromEntries(names.map((name) => [name, false])),
    missing: names.length > 0 ? names : [reason],
    score: 0
  };
};
