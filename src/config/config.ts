import { z } from "zod";
import { loadEnvFile } from "./loadEnv.js";

const envSchema = z.object({
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  VUEBENCH_MODEL: z.string().min(1).optional(),
  VUEBENCH_RESULTS_DIR: z.string().min(1).default("results"),
  VUEBENCH_MODEL_TIMEOUT_SEC: z.coerce.number().positive().default(120)
});

export type BenchConfig = {
  ollamaBaseUrl: string;
  defaultModel?: string;
  resultsDir: string;
  modelTimeoutMs: number;
};

export const parseBenchConfig = (env: NodeJS.ProcessEnv): BenchConfig => {
  const parsed = envSchema.parse({
    OLLAMA_BASE_URL: env.OLLAMA_BASE_URL || undefined,
    VUEBENCH_MODEL: env.VUEBENCH_MODEL || undefined,
    VUEBENCH_RESULTS_DIR: env.VUEBENCH_RESULTS_DIR || undefined,
    VUEBENCH_MODEL_TIMEOUT_SEC: env.VUEBENCH_MODEL_TIMEOUT_SEC || undefined
  });
  return {
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    defaultModel: parsed.VUEBENCH_MODEL,
    resultsDir: parsed.VUEBENCH_RESULTS_DIR,
    modelTimeoutMs: parsed.VUEBENCH_MODEL_TIMEOUT_SEC * 1000
  };
};

export const loadBenchConfig = (envFile = ".env"): BenchConfig => {
  loadEnvFile(envFile);
  return parseBenchConfig(process.env);
};
