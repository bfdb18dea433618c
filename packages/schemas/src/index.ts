export { GOAL_TAGS, STEP_ACTIONS, BASELINE_GOAL } from "./types.js";
export type {
  GoalTag,
  PlanGoal,
  StepAction,
  StepParamValue,
  StepParams,
  Step,
  PlanConstraints,
  Plan,
  PlanGenerator,
  Planner,
} from "./types.js";
export { PlanSchema, StepSchema } from "./plan.schema.js";
export { validatePlanData, assertValidPlan } from "./validator.js";
export type { ValidationResult } from "./validator.js";
export { NotImplementedError, isNotImplementedError } from "./errors.js";
