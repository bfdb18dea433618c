import { Command } from "commander";
import { createPlanner, DeterministicPlanner } from "@steadyplan/planner";
import { compareReproducibility } from "@steadyplan/repro";
import { loadConfig } from "./config.js";
import type { CliConfig } from "./config.js";
import { processIO } from "./io.js";
import type { CommandIO } from "./io.js";
import { positiveIntArg, seedArg } from "./options.js";
import { formatReport } from "./report-formatter.js";

interface ReproOptions {
  request?: string;
  trials?: number;
  seed?: number;
}

/** `readConfig` is called when the action runs; options win over its values. */
export function createReproProgram(
  io: CommandIO = processIO,
  readConfig: () => CliConfig = () => loadConfig(),
): Command {
  const program = new Command();
  program
    .name("steadyplan-repro")
    .description("Run both planners repeatedly on one request and count distinct plans")
    .version("0.1.0")
    .option("--request <text>", "Request to plan repeatedly (default: STEADYPLAN_REQUEST or a sample request)")
    .option("--trials <n>", "Runs per planner (default: STEADYPLAN_TRIALS or 10)", positiveIntArg("--trials"))
    .option("--seed <n>", "Seed for the baseline planner", seedArg("--seed"))
    .configureOutput({ writeOut: io.out, writeErr: io.err })
    .action((opts: ReproOptions) => {
      const config = readConfig();
      const deterministic = new DeterministicPlanner();
      const baseline = createPlanner("baseline", { seed: opts.seed ?? config.seed });
      const report = compareReproducibility({
        request: opts.request ?? config.request,
        trials: opts.trials ?? config.trials,
        deterministic: request => deterministic.generate(request),
        baseline: request => baseline.generate(request),
      });
      io.out(formatReport(report, { color: io.color }));
    });
  return program;
}
