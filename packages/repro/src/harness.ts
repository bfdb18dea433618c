import type { Plan, PlanGenerator } from "@steadyplan/schemas";
import { canonicalize } from "./canonical.js";

export interface TrialResult {
  /** Number of distinct canonical plans seen. */
  distinctCount: number;
  /** Every plan, in the order it was generated. */
  plans: Plan[];
}

/**
 * Calls `generator` `n` times with the same request and counts distinct
 * canonical forms. A generator error ends the run and propagates.
 */
export function runTrials(generator: PlanGenerator, request: string, n: number): TrialResult {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`Trial count must be a positive integer, got ${n}`);
  }
  const seen = new Set<string>();
  const plans: Plan[] = [];
  for (let i = 0; i < n; i++) {
    const plan = generator(request);
    plans.push(plan);
    seen.add(canonicalize(plan));
  }
  return { distinctCount: seen.size, plans };
}

export interface ReproducibilityInput {
  request: string;
  trials: number;
  deterministic: PlanGenerator;
  baseline: PlanGenerator;
}

export interface ReproducibilityReport {
  request: string;
  trials: number;
  deterministicDistinct: number;
  baselineDistinct: number;
  /** The deterministic path must collapse to a single plan. */
  deterministicReproducible: boolean;
  /** Probabilistic: a small sample can land on one plan by chance. */
  baselineDrifted: boolean;
}

export function compareReproducibility(input: ReproducibilityInput): ReproducibilityReport {
  const deterministic = runTrials(input.deterministic, input.request, input.trials);
  const baseline = runTrials(input.baseline, input.request, input.trials);
  return {
    request: input.request,
    trials: input.trials,
    deterministicDistinct: deterministic.distinctCount,
    baselineDistinct: baseline.distinctCount,
    deterministicReproducible: deterministic.distinctCount === 1,
    baselineDrifted: baseline.distinctCount > 1,
  };
}
