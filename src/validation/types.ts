export type CompilationResult = {
  success: boolean;
  errors: string[];
  warnings: string[];
  durationSec: number;
  timedOut: boolean;
};

export type SfcImport = { source: string; isTypeOnly: boolean };

/** Structural facts the SFC parser extracts from a component's script block. */
export type SfcFacts = {
  hasScriptLangTs: boolean;
  scriptLang: string | null;
  interfaces: string[];
  typeAnnotations: string[];
  imports: SfcImport[];
  variables: string[];
};

export type PatternCategory = "interfaces" | "type_annotations" | "imports" | "script_lang";

export type PatternResult = {
  /** one entry per required category (including named source patterns) */
  checks: Record<string, boolean>;
  missing: string[];
  /** 0..10, two decimals */
  score: number;
};

export type NamingResult = {
  followsConventions: boolean;
  violations: string[];
  /** 0..1 */
  score: number;
};

export type ScoringWeights = {
  compilation: number;
  pattern_match: number;
  naming: number;
};

export type RequiredPatterns = {
  interfaces?: string[];
  type_annotations?: string[];
  imports?: string[];
  script_lang?: string;
  source_patterns?: Record<string, string>;
};

export type CaseStyle = "PascalCase" | "camelCase";

export type NamingConventions = {
  interfaces?: CaseStyle;
  interface_suffixes?: string[];
  props_interface_suffix?: string;
  variables?: CaseStyle;
};

/** Explicit per-validator outcome; the pipeline turns failures into zero scores. */
export type ValidatorOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export type AstParser = (code: string) => Promise<SfcFacts>;

export type Compiler = () => Promise<CompilationResult>;
