import { round2 } from "./patterns.js";
import type { CaseStyle, NamingConventions, NamingResult } from "./types.js";

const casePatterns: Record<CaseStyle, RegExp> = {
  PascalCase: /^[A-Z][A-Za-z0-9]*$/,
  camelCase: /^[a-z][A-Za-z0-9]*$/
};

const caseHint: Record<CaseStyle, string> = {
  PascalCase: "must start with uppercase",
  camelCase: "must start with lowercase"
};

/** Regex fallback used when the SFC parser produced no facts. */
export const scanInterfaceNames = (code: string): string[] =>
  Array.from(code.matchAll(/\binterface\s+([A-Za-z_$][\w$]*)/g), (match) => match[1]);

export const scanVariableNames = (code: string): string[] =>
  Array.from(code.matchAll(/\b(?:const|let|var)\s+([A-Za-z_$][\w$]*)/g), (match) => match[1]);

const acceptedSuffixes = (conventions: NamingConventions): string[] | undefined => {
  if (conventions.interface_suffixes !== undefined) return conventions.interface_suffixes;
  return conventions.props_interface_suffix ? [conventions.props_interface_suffix] : undefined;
};

const interfaceViolations = (name: string, conventions: NamingConventions): string[] => {
  const out: string[] = [];
  const style = conventions.interfaces;
  if (style && !casePatterns[style].test(name)) {
    out.push(`Interface '${name}' is not ${style} (${caseHint[style]})`);
  }

  const suffixes = acceptedSuffixes(conventions);
  if (suffixes && suffixes.length > 0 && !suffixes.some((suffix) => name.endsWith(suffix))) {
    out.push(
      suffixes.length === 1
        ? `Interface '${name}' missing '${suffixes[0]}' suffix`
        : `Interface '${name}' must end with one of: ${suffixes.join(", ")}`
    );
  }
  return out;
};

/**
 * Applies the naming convention to declared interface (and optionally variable) names.
 * Score is the fraction of checked names without a violation; nothing to check scores 1.
 */
export const checkNaming = (
  names: { interfaces: string[]; variables: string[] },
  conventions: NamingConventions
): NamingResult => {
  const violations: string[] = [];
  let checked = 0;
  let conforming = 0;

  const interfaceRules = conventions.interfaces !== undefined || acceptedSuffixes(conventions) !== undefined;
  if (interfaceRules) {
    names.interfaces.forEach((name) => {
      const found = interfaceViolations(name, conventions);
      checked += 1;
      if (found.length === 0) conforming += 1;
      violations.push(...found);
    });
  }

  const variableStyle = conventions.variables;
  if (variableStyle) {
    names.variables.forEach((name) => {
      checked += 1;
      if (casePatterns[variableStyle].test(name)) {
        conforming += 1;
      } else {
        violations.push(`Variable '${name}' is not ${variableStyle} (${caseHint[variableStyle]})`);
      }
    });
  }

  return {
    followsConventions: violations.length === 0,
    violations,
    score: checked === 0 ? 1 : round2(conforming / checked)
  };
};
