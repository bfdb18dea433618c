/**
 * steadyplan Core Types
 *
 * The plan model shared by the planners, the reproducibility harness and
 * the CLI. Field names follow the plan JSON wire format exactly.
 */

// ─── Goals ──────────────────────────────────────────────────────────

export const GOAL_TAGS = [
  "find_papers_and_summarize",
  "find_papers",
  "compare_sources",
  "generate_report",
  "fetch_news",
  "generic_information_task",
] as const;

export type GoalTag = (typeof GOAL_TAGS)[number];

/** Goal reported by the baseline planner, which does not classify. */
export const BASELINE_GOAL = "mock_dynamic_plan";

export type PlanGoal = GoalTag | typeof BASELINE_GOAL;

// ─── Steps ──────────────────────────────────────────────────────────

export const STEP_ACTIONS = [
  "search",
  "extract",
  "summarize",
  "identify_entities",
  "fetch_facts",
  "compare",
  "gather_context",
  "outline",
  "write",
  "reflect",
] as const;

export type StepAction = (typeof STEP_ACTIONS)[number];

export type StepParamValue = string | number | boolean | string[];

export type StepParams = Record<string, StepParamValue>;

export interface Step {
  id: number;
  action: StepAction;
  params: StepParams;
}

// ─── Plan ───────────────────────────────────────────────────────────

export interface PlanConstraints {
  max_latency_ms: number | null;
  must_be_reproducible: boolean;
}

export interface Plan {
  goal: PlanGoal;
  original_request: string;
  steps: Step[];
  constraints: PlanConstraints;
}

// ─── Planner Contract ───────────────────────────────────────────────

/** A single planning call. No determinism is implied. */
export type PlanGenerator = (request: string) => Plan;

/** Planner interface. Defined here so the planner, repro and cli packages share it. */
export interface Planner {
  readonly name: string;
  generate(request: string): Plan;
}
