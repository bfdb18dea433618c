import type { Plan, PlanConstraints, Planner } from "@steadyplan/schemas";
import { classifyGoal } from "./goal-classifier.js";
import { buildSteps } from "./step-builder.js";

export const DETERMINISTIC_MAX_LATENCY_MS = 8000;

/**
 * Rule-based planner: the plan is a pure function of the request text.
 * No randomness, no clock, no model calls.
 */
export function buildPlan(request: string): Plan {
  const goal = classifyGoal(request);
  const steps = buildSteps(goal, request);
  const constraints: PlanConstraints = {
    max_latency_ms: DETERMINISTIC_MAX_LATENCY_MS,
    must_be_reproducible: true,
  };
  return {
    goal,
    original_request: request,
    steps,
    constraints,
  };
}

export class DeterministicPlanner implements Planner {
  readonly name = "deterministic";

  generate(request: string): Plan {
    return buildPlan(request);
  }
}
