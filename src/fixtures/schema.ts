import { z } from "zod";
import { weightsSumToOne } from "../validation/scoring.js";

export const BENCH_CATEGORIES = ["agent", "refactoring", "creation"] as const;

export type BenchCategory = (typeof BENCH_CATEGORIES)[number];

export const benchCategorySchema = z.enum(BENCH_CATEGORIES);

export const DEFAULT_MAX_STEPS = 5;

/** `"ts"`, `'<script setup lang="ts">'` or a list of either reduce to the bare lang value. */
export const normalizeScriptLang = (value: string | string[]): string | undefined => {
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) return undefined;
  const match = /lang\s*=\s*["']?([\w-]+)/.exec(first);
  return match?.[1] ?? first.trim();
};

const caseStyleSchema = z.enum(["PascalCase", "camelCase"]);

const requiredPatternsSchema = z
  .object({
    interfaces: z.array(z.string()).optional(),
    type_annotations: z.array(z.string()).optional(),
    imports: z.array(z.string()).optional(),
    script_lang: z
      .union([z.string(), z.array(z.string())])
      .optional()
      .transform((value) => (value === undefined ? undefined : normalizeScriptLang(value))),
    source_patterns: z
      .record(
        z.string(),
        z.string().refine((pattern) => {
          try {
            new RegExp(pattern, "m");
            return true;
          } catch {
            return false;
          }
        }, "invalid regular expression")
      )
      .optional()
  });

const namingConventionsSchema = z
  .object({
    interfaces: caseStyleSchema.optional(),
    interface_suffixes: z.array(z.string().min(1)).optional(),
    props_interface_suffix: z.string().min(1).optional(),
    variables: caseStyleSchema.optional()
  });

const weightSchema = z.number().min(0).max(1);

const scoringSchema = z
  .object({
    compilation: weightSchema,
    pattern_match: weightSchema,
    naming: weightSchema
  })
  .refine(weightsSumToOne, "scoring weights must sum to 1");

const timeoutsSchema = z.object({
  compile_sec: z.number().positive().optional(),
  ast_sec: z.number().positive().optional(),
  model_sec: z.number().positive().optional()
});

export const validationSpecSchema = z
  .object({
    target_file: z.string().min(1, "target_file is required"),
    category: benchCategorySchema.optional(),
    description: z.string().optional(),
    required_patterns: requiredPatternsSchema.default({}),
    naming_conventions: namingConventionsSchema.default({}),
    scoring: scoringSchema,
    max_steps: z.number().int().positive().optional(),
    max_iterations: z.number().int().positive().optional(),
    timeouts: timeoutsSchema.default({})
  })
  .transform(({ max_steps, max_iterations, ...rest }) => ({
    ...rest,
    max_steps: max_steps ?? max_iterations ?? DEFAULT_MAX_STEPS
  }));

export type ValidationSpec = z.output<typeof validationSpecSchema>;
