export { classifyGoal, GOAL_RULES, FALLBACK_GOAL } from "./goal-classifier.js";
export type { GoalRule } from "./goal-classifier.js";
export { buildSteps, STEP_TEMPLATES } from "./step-builder.js";
export type { StepTemplate } from "./step-builder.js";
export { buildPlan, DeterministicPlanner, DETERMINISTIC_MAX_LATENCY_MS } from "./deterministic-planner.js";
export { DriftPlanner, PERTURB_PROBABILITY, TOP_K_CHOICES, MAX_WORDS_CHOICES } from "./drift-planner.js";
export type { DriftPlannerOptions } from "./drift-planner.js";
export { RemotePlanner } from "./remote-planner.js";
export { mathRandom, createSeededRandom, pick, shuffle } from "./random.js";
export type { RandomSource } from "./random.js";
export { createPlanner, isPlannerKind, PLANNER_KINDS } from "./planner-factory.js";
export type { PlannerKind, CreatePlannerOptions } from "./planner-factory.js";
