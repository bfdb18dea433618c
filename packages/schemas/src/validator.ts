import Ajv, { type ErrorObject } from "ajv";
import { PlanSchema } from "./plan.schema.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });

const validatePlan = ajv.compile(PlanSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validatePlanData(data: unknown): ValidationResult {
  const valid = validatePlan(data);
  return toResult(valid, validatePlan.errors);
}

/** Throws when `data` is not a well-formed plan. Used before a plan leaves the process. */
export function assertValidPlan(data: unknown): void {
  const result = validatePlanData(data);
  if (!result.valid) {
    throw new Error(`Invalid plan: ${result.errors.join("; ")}`);
  }
}
