import { Command, Option } from "commander";
import { assertValidPlan } from "@steadyplan/schemas";
import type { Plan } from "@steadyplan/schemas";
import { createPlanner, PLANNER_KINDS } from "@steadyplan/planner";
import { processIO } from "./io.js";
import type { CommandIO } from "./io.js";
import { seedArg } from "./options.js";

interface PlanOptions {
  goal: string;
  pretty?: boolean;
  planner: string;
  seed?: number;
  verbose?: boolean;
}

/** One JSON document per call, newline-terminated. Non-ASCII text is written as-is. */
export function renderPlan(plan: Plan, pretty: boolean): string {
  return (pretty ? JSON.stringify(plan, null, 2) : JSON.stringify(plan)) + "\n";
}

export function createPlanProgram(io: CommandIO = processIO): Command {
  const program = new Command();
  program
    .name("steadyplan")
    .description("Turn a free-text request into a reproducible JSON plan")
    .version("0.1.0")
    .requiredOption("--goal <text>", "Natural-language request to plan for")
    .option("--pretty", "Indent the JSON output by two spaces")
    .addOption(
      new Option("--planner <kind>", "Planner to use")
        .choices(PLANNER_KINDS)
        .default("deterministic")
    )
    .option("--seed <n>", "Seed for the baseline planner", seedArg("--seed"))
    .option("--verbose", "Log the planner and goal to stderr")
    .configureOutput({ writeOut: io.out, writeErr: io.err })
    .action((opts: PlanOptions) => {
      const planner = createPlanner(opts.planner, { seed: opts.seed });
      const plan = planner.generate(opts.goal);
      assertValidPlan(plan);
      if (opts.verbose) {
        io.err(`[steadyplan] planner=${planner.name} goal=${plan.goal} steps=${plan.steps.length}\n`);
      }
      io.out(renderPlan(plan, opts.pretty ?? false));
    });
  return program;
}
