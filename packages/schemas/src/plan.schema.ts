import { STEP_ACTIONS } from "./types.js";

export const StepSchema = {
  type: "object",
  required: ["id", "action", "params"],
  properties: {
    id: { type: "integer", minimum: 1 },
    action: { type: "string", enum: STEP_ACTIONS },
    params: {
      type: "object",
      additionalProperties: {
        anyOf: [
          { type: "string" },
          { type: "number" },
          { type: "boolean" },
          { type: "array", items: { type: "string" } },
        ],
      },
    },
  },
  additionalProperties: false,
} as const;

export const PlanSchema = {
  type: "object",
  required: ["goal", "original_request", "steps", "constraints"],
  properties: {
    goal: { type: "string", minLength: 1 },
    original_request: { type: "string" },
    steps: { type: "array", items: StepSchema, minItems: 1 },
    constraints: {
      type: "object",
      required: ["max_latency_ms", "must_be_reproducible"],
      properties: {
        max_latency_ms: { type: ["integer", "null"], minimum: 0 },
        must_be_reproducible: { type: "boolean" },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const;
