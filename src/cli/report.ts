import chalk from "chalk";
import type { BenchmarkResult } from "../bench/types.js";
import { scoreBreakdown } from "../validation/scoring.js";

export const LOW_SCORE_THRESHOLD = 7.0;

const MAX_ERRORS_SHOWN = 3;

export type BatchSummary = {
  runs: number;
  avgFinalScore: number;
  avgPatternScore: number;
  /** 0..10, the naming score scaled for display */
  avgNamingScore: number;
  avgTokensPerSec: number;
  avgDurationSec: number;
  compileSuccesses: number;
  compileSuccessRate: number;
  agentSuccesses?: number;
};

const average = (values: number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

export const summarizeResults = (results: readonly BenchmarkResult[]): BatchSummary => {
  const compileSuccesses = results.filter((result) => result.compiles).length;
  const agentRuns = results.filter((result) => result.agent !== undefined);
  return {
    runs: results.length,
    avgFinalScore: average(results.map((result) => result.finalScore)),
    avgPatternScore: average(results.map((result) => result.pattern.score)),
    avgNamingScore: average(results.map((result) => result.naming.score * 10)),
    avgTokensPerSec: average(results.map((result) => result.tokensPerSec)),
    avgDurationSec: average(results.map((result) => result.durationSec)),
    compileSuccesses,
    compileSuccessRate: results.length === 0 ? 0 : (100 * compileSuccesses) / results.length,
    agentSuccesses: agentRuns.length > 0 ? agentRuns.filter((result) => result.agent?.succeeded).length : undefined
  };
};

const pct = (weight: number): string => `${(weight * 100).toFixed(0)}%`;

export const formatRunReport = (result: BenchmarkResult): string[] => {
  const weights = result.scoringWeights;
  const points = scoreBreakdown(weights, result.compiles, result.pattern.score, result.naming.score);
  const compileIcon = result.compiles ? chalk.green("✓") : chalk.red("✗");
  const scoreIcon = result.finalScore >= 8 ? chalk.green("✓") : chalk.yellow("✗");

  const checks = Object.entries(result.pattern.checks)
    .map(([name, ok]) => (ok ? chalk.green(name) : chalk.red(name)))
    .join(" ");
  const naming =
    result.naming.violations.length === 0
      ? chalk.green("✓ conventions")
      : chalk.red(`✗ ${result.naming.violations.join("; ")}`);

  const lines = [
    `${compileIcon} Compile | ${scoreIcon} Score  ${chalk.bold(`Run ${result.runNumber}`)}: ${chalk.bold.cyan(
      `${result.finalScore.toFixed(1)}/10`
    )}  ${chalk.dim(`${result.tokensPerSec.toFixed(1)} tok/s  ${result.durationSec.toFixed(1)}s`)}`,
    `   Scoring:  compile ${points.compile.toFixed(1)}pt (${pct(weights.compilation)}) + pattern ${points.pattern.toFixed(
      1
    )}pt (${pct(weights.pattern_match)}) + naming ${points.naming.toFixed(1)}pt (${pct(weights.naming)})`,
    `   Patterns: ${checks || chalk.dim("none required")}  ${chalk.dim(`(score ${result.pattern.score.toFixed(1)}/10)`)}`,
    `   Naming:   ${naming}  ${chalk.dim(`(score ${(result.naming.score * 10).toFixed(1)}/10)`)}`
  ];

  if (result.agent) {
    const agent = result.agent;
    const status = agent.succeeded ? chalk.green(agent.status) : chalk.yellow(agent.status);
    lines.push(`   Agent:    ${status} in ${agent.steps}/${agent.maxSteps} steps, ${agent.compileAttempts} compile attempts`);
  }
  result.compilation.errors.slice(0, MAX_ERRORS_SHOWN).forEach((error) => {
    lines.push(chalk.red(`     TS error: ${error}`));
  });
  result.errors.forEach((error) => {
    lines.push(chalk.yellow(`     ${error}`));
  });
  return lines;
};

export const formatSummary = (summary: BatchSummary): string[] => {
  const lines = [
    chalk.bold("Summary:"),
    `  Avg Final Score:   ${chalk.bold.cyan(`${summary.avgFinalScore.toFixed(2)}/10`)}`,
    `  Avg Pattern Score: ${summary.avgPatternScore.toFixed(2)}/10`,
    `  Avg Naming Score:  ${summary.avgNamingScore.toFixed(2)}/10`,
    `  Avg Speed:         ${summary.avgTokensPerSec.toFixed(1)} tok/s`,
    `  Avg Duration:      ${summary.avgDurationSec.toFixed(1)}s`,
    `  Compile Success:   ${summary.compileSuccessRate.toFixed(0)}% (${summary.compileSuccesses}/${summary.runs} runs)`
  ];
  if (summary.agentSuccesses !== undefined) {
    lines.push(`  Agent Finished:    ${summary.agentSuccesses}/${summary.runs} runs`);
  }
  if (summary.runs > 0 && summary.avgFinalScore < LOW_SCORE_THRESHOLD) {
    lines.push(
      chalk.yellow(`⚠ Warning: Average score is ${summary.avgFinalScore.toFixed(1)}/10 (target ≥${LOW_SCORE_THRESHOLD.toFixed(1)})`)
    );
  }
  return lines;
};
