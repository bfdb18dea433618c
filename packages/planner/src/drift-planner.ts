import { BASELINE_GOAL } from "@steadyplan/schemas";
import type { Plan, Planner, Step } from "@steadyplan/schemas";
import { mathRandom, pick, shuffle } from "./random.js";
import type { RandomSource } from "./random.js";

export const PERTURB_PROBABILITY = 0.5;
export const TOP_K_CHOICES = [3, 4, 5] as const;
export const MAX_WORDS_CHOICES = [150, 200, 250] as const;

export interface DriftPlannerOptions {
  random?: RandomSource;
}

function baselineSteps(request: string): Step[] {
  return [
    { id: 1, action: "search", params: { source: "web", query: request, top_k: 3 } },
    { id: 2, action: "summarize", params: { style: "short", max_words: 200 } },
    { id: 3, action: "reflect", params: { check_consistency: true } },
  ];
}

function perturb(random: RandomSource, step: Step): Step {
  switch (step.action) {
    case "search":
      return { ...step, params: { ...step.params, top_k: pick(random, TOP_K_CHOICES) } };
    case "summarize":
      return { ...step, params: { ...step.params, max_words: pick(random, MAX_WORDS_CHOICES) } };
    default:
      return step;
  }
}

/**
 * Baseline that behaves like an unpredictable planning agent: the same
 * request can come back with its steps reordered (ids travel with their
 * steps) and, half the time, with different search and summary sizes.
 */
export class DriftPlanner implements Planner {
  readonly name = "baseline";
  private random: RandomSource;

  constructor(opts?: DriftPlannerOptions) {
    this.random = opts?.random ?? mathRandom;
  }

  generate(request: string): Plan {
    let steps = shuffle(this.random, baselineSteps(request));
    if (this.random.next() < PERTURB_PROBABILITY) {
      steps = steps.map(step => perturb(this.random, step));
    }
    return {
      goal: BASELINE_GOAL,
      original_request: request,
      steps,
      constraints: {
        max_latency_ms: null,
        must_be_reproducible: false,
      },
    };
  }
}
