import type { Planner } from "@steadyplan/schemas";
import { DeterministicPlanner } from "./deterministic-planner.js";
import { DriftPlanner } from "./drift-planner.js";
import { RemotePlanner } from "./remote-planner.js";
import { createSeededRandom } from "./random.js";

export const PLANNER_KINDS = ["deterministic", "baseline", "remote"] as const;

export type PlannerKind = (typeof PLANNER_KINDS)[number];

export interface CreatePlannerOptions {
  /** Seeds the baseline planner; ignored by the other kinds. */
  seed?: number;
}

export function isPlannerKind(value: string): value is PlannerKind {
  return (PLANNER_KINDS as readonly string[]).includes(value);
}

export function createPlanner(kind: string, opts: CreatePlannerOptions = {}): Planner {
  if (!isPlannerKind(kind)) {
    throw new Error(`Unknown planner type "${kind}". Supported: ${PLANNER_KINDS.join(", ")}`);
  }
  switch (kind) {
    case "deterministic":
      return new DeterministicPlanner();
    case "baseline":
      return new DriftPlanner(opts.seed !== undefined ? { random: createSeededRandom(opts.seed) } : {});
    case "remote":
      return new RemotePlanner();
  }
}
