#!/usr/bin/env node
/**
 * Run examples:
 * - `npm run dev -- --model qwen2.5-coder:7b --fixture fixtures/agent/ts-bugfix`
 * - `npm run dev -- --fixture fixtures/refactoring/simple-component --runs 3 --out ./results`
 * - `npm run dev` (asks for model and fixture when attached to a terminal)
 *
 * Ollama env:
 * - `export OLLAMA_BASE_URL=http://localhost:11434`
 * - `export VUEBENCH_MODEL=qwen2.5-coder:7b`
 */
import process from "node:process";
import chalk from "chalk";
import prompts from "prompts";
import { ZodError } from "zod";
import { runBenchmark } from "./bench/index.js";
import { formatSummary, summarizeResults } from "./cli/report.js";
import { createRunPanel } from "./cli/ui/runPanel.js";
import { loadBenchConfig } from "./config/config.js";
import { errorMessage, isRunAbort } from "./errors.js";
import { discoverFixtures, loadFixture } from "./fixtures/loadFixture.js";
import { getProviderFromConfig } from "./llm/index.js";
import { saveResults } from "./results/store.js";
import { runCmd } from "./runner/runCmd.js";

type CliOptions = {
  model?: string;
  fixtureDir?: string;
  fixturesRoot: string;
  runs: number;
  outDir?: string;
  yes: boolean;
  help: boolean;
};

const DEFAULT_RUNS = 3;

const parseArgs = (argv: string[]): CliOptions => {
  const options: CliOptions = { fixturesRoot: "fixtures", runs: DEFAULT_RUNS, yes: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "--model") {
      options.model = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--fixture") {
      options.fixtureDir = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--fixtures-root") {
      options.fixturesRoot = argv[i + 1] ?? options.fixturesRoot;
      i += 1;
      continue;
    }
    if (arg === "--runs") {
      const raw = Number(argv[i + 1]);
      options.runs = Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : DEFAULT_RUNS;
      i += 1;
      continue;
    }
    if (arg === "--out") {
      options.outDir = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === "--yes" || arg === "-y") {
      options.yes = true;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }

    if (arg && !arg.startsWith("-") && !options.fixtureDir) {
      options.fixtureDir = arg;
    }
  }

  return options;
};

const usage = (): void => {
  console.error("Usage: vuebench [--model M] [--fixture DIR] [--runs N] [--out DIR] [--fixtures-root DIR] [--yes]");
};

const askModel = async (initial?: string): Promise<string | undefined> => {
  const answer = await prompts({ type: "text", name: "model", message: "Ollama model", initial });
  const value: unknown = answer.model;
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
};

const askFixture = async (root: string): Promise<string | undefined> => {
  const fixtures = await discoverFixtures(root);
  if (fixtures.length === 0) {
    console.error(`No fixtures found under ${root}`);
    return undefined;
  }
  const answer = await prompts({
    type: "select",
    name: "fixture",
    message: "Fixture",
    choices: fixtures.map((dir) => ({ title: dir, value: dir }))
  });
  const value: unknown = answer.fixture;
  return typeof value === "string" ? value : undefined;
};

const confirmRun = async (): Promise<boolean> => {
  const answer = await prompts({ type: "confirm", name: "go", message: "Start benchmark?", initial: true });
  return answer.go === true;
};

const printValidationErrors = (error: ZodError): void => {
  console.error("Configuration validation failed:");
  error.issues.forEach((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    console.error(`- ${path}: ${issue.message}`);
  });
};

const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    usage();
    return;
  }

  const interactive = Boolean(process.stdin.isTTY) && !options.yes;

  try {
    const config = loadBenchConfig();
    const model = options.model ?? config.defaultModel ?? (interactive ? await askModel() : undefined);
    const fixtureDir = options.fixtureDir ?? (interactive ? await askFixture(options.fixturesRoot) : undefined);
    if (!model || !fixtureDir) {
      usage();
      process.exitCode = 1;
      return;
    }

    const fixture = await loadFixture(fixtureDir);
    console.log(chalk.bold.cyan("Vue + TypeScript LLM benchmark"));
    console.log(`Model:    ${chalk.yellow(model)}`);
    console.log(`Fixture:  ${chalk.yellow(`${fixture.category}/${fixture.name}`)}`);
    console.log(`Runs:     ${chalk.yellow(String(options.runs))}\n`);

    if (interactive && !(await confirmRun())) {
      console.log("Cancelled.");
      return;
    }

    const panel = createRunPanel({ model, fixture: fixture.name, maxSteps: fixture.spec.max_steps });
    const results = await runBenchmark(
      fixture,
      {
        provider: getProviderFromConfig(config),
        model,
        runCmdImpl: runCmd,
        modelTimeoutMs: config.modelTimeoutMs,
        onEvent: panel.onEvent
      },
      { runs: options.runs }
    );

    console.log(`\n${formatSummary(summarizeResults(results)).join("\n")}`);
    const outFile = await saveResults(results, options.outDir ?? config.resultsDir);
    console.log(chalk.green(`\n✓ Results saved to ${outFile}`));
  } catch (error) {
    if (error instanceof ZodError) {
      printValidationErrors(error);
      process.exitCode = 1;
      return;
    }
    if (isRunAbort(error)) {
      console.error(chalk.red(`\n✗ Run aborted: ${errorMessage(error)}`));
      process.exitCode = 2;
      return;
    }
    console.error(chalk.red(`\n✗ Unexpected error: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
};

void main();
