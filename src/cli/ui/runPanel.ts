import process from "node:process";
import boxen from "boxen";
import chalk from "chalk";
import logUpdate from "log-update";
import ora from "ora";
import type { AgentEvent } from "../../agent/events.js";
import type { BenchEvent } from "../../bench/events.js";
import { formatRunReport } from "../report.js";

const truncate = (value: string | undefined, max = 200): string | undefined => {
  if (!value) return value;
  return value.length > max ? `${value.slice(0, max)}...` : value;
};

type PanelState = {
  fixture: string;
  run: number;
  totalRuns: number;
  step: number;
  maxSteps: number;
  status: string;
  compileAttempts: number;
  lastError?: string;
};

/**
 * Console rendering for benchmark events: a spinner per phase and, for agent runs, a status
 * box that follows the loop.
 */
export const createRunPanel = (args: { model: string; fixture: string; maxSteps: number }) => {
  const interactive = Boolean(process.stdout.isTTY);
  const panel: PanelState = {
    fixture: args.fixture,
    run: 0,
    totalRuns: 0,
    step: 0,
    maxSteps: args.maxSteps,
    status: "idle",
    compileAttempts: 0
  };

  let spinner: ReturnType<typeof ora> | undefined;

  const stopSpinner = (): void => {
    if (spinner?.isSpinning) spinner.stop();
    spinner = undefined;
  };

  const renderPanel = (): void => {
    if (!interactive) return;
    const body = [
      `${chalk.bold("Model")}: ${args.model}`,
      `${chalk.bold("Fixture")}: ${panel.fixture} (run ${panel.run}/${panel.totalRuns})`,
      `${chalk.bold("Step")}: ${panel.step}/${panel.maxSteps}`,
      `${chalk.bold("Status")}: ${panel.status}`,
      `${chalk.bold("Compile attempts")}: ${panel.compileAttempts}`,
      `${chalk.bold("Last error")}: ${panel.lastError ?? "-"}`
    ].join("\n");

    logUpdate(
      boxen(body, {
        borderColor: "cyan",
        padding: { left: 1, right: 1, top: 0, bottom: 0 },
        margin: { top: 0, bottom: 1 },
        title: "Agent",
        titleAlignment: "left"
      })
    );
  };

  const onAgentEvent = (event: AgentEvent): void => {
    switch (event.type) {
      case "step_start":
        panel.step = event.step;
        panel.status = "waiting for model";
        break;
      case "tool_start":
        panel.status = `running ${event.name}`;
        if (event.name === "run_compilation") panel.compileAttempts += 1;
        stopSpinner();
        spinner = ora(`tool ${event.name}`).start();
        break;
      case "tool_end": {
        const note = truncate(event.note);
        if (spinner?.isSpinning) {
          if (event.ok) spinner.succeed(`${event.name} ✓${note ? ` ${note}` : ""}`);
          else spinner.fail(`${event.name} ✗${note ? ` ${note}` : ""}`);
          spinner = undefined;
        } else {
          console.log(`${event.ok ? "✓" : "✗"} ${event.name}${note ? ` ${note}` : ""}`);
        }
        if (!event.ok) panel.lastError = truncate(event.note, 220);
        break;
      }
      case "parse_failed":
        panel.lastError = truncate(`${event.kind}: ${event.reason}`, 220);
        break;
      case "finished":
        panel.status = "finished";
        break;
      case "max_steps":
        panel.status = "step budget exhausted";
        break;
      case "aborted":
        panel.status = "aborted";
        panel.lastError = truncate(event.message, 220);
        break;
    }
    renderPanel();
  };

  const onEvent = (event: BenchEvent): void => {
    switch (event.type) {
      case "run_start":
        panel.run = event.runNumber;
        panel.totalRuns = event.totalRuns;
        panel.step = 0;
        panel.compileAttempts = 0;
        panel.lastError = undefined;
        panel.status = "starting";
        break;
      case "generating":
        stopSpinner();
        spinner = ora(`Run ${event.runNumber}: generating`).start();
        break;
      case "validating":
        stopSpinner();
        if (interactive) logUpdate.done();
        spinner = ora(`Run ${event.runNumber}: validating`).start();
        break;
      case "agent":
        onAgentEvent(event.event);
        break;
      case "run_done":
        stopSpinner();
        console.log(formatRunReport(event.result).join("\n"));
        break;
      case "run_aborted":
        if (spinner?.isSpinning) spinner.fail(`Run ${event.runNumber} aborted`);
        spinner = undefined;
        if (interactive) logUpdate.done();
        break;
    }
  };

  return { onEvent };
};
