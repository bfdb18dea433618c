import { describe, it, expect } from "vitest";
import { validatePlanData, assertValidPlan } from "./validator.js";

describe("validatePlanData", () => {
  const validPlan = () => ({
    goal: "find_papers",
    original_request: "Find papers on graph search",
    steps: [
      {
        id: 1,
        action: "search",
        params: { source: "scholar_like", query: "Find papers on graph search", top_k: 5 },
      },
    ],
    constraints: { max_latency_ms: 8000, must_be_reproducible: true },
  });

  it("accepts a valid plan", () => {
    const result = validatePlanData(validPlan());
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it("accepts a null latency budget", () => {
    const plan = validPlan();
    const result = validatePlanData({
      ...plan,
      constraints: { max_latency_ms: null, must_be_reproducible: false },
    });
    expect(result.valid).toBe(true);
  });

  it("accepts list-valued params", () => {
    const plan = validPlan();
    const result = validatePlanData({
      ...plan,
      steps: [...plan.steps, { id: 2, action: "extract", params: { fields: ["title", "year"] } }],
    });
    expect(result.valid).toBe(true);
  });

  it("rejects plan missing required fields", () => {
    const result = validatePlanData({ goal: "x" });
    expect(result.valid).toBe(false);
    expect(result.errors.length).toBeGreaterThan(0);
  });

  it("rejects plan with empty steps array", () => {
    const result = validatePlanData({ ...validPlan(), steps: [] });
    expect(result.valid).toBe(false);
  });

  it("rejects an unknown action", () => {
    const plan = validPlan();
    const result = validatePlanData({
      ...plan,
      steps: [{ id: 1, action: "execute", params: {} }],
    });
    expect(result.valid).toBe(false);
    expect(result.errors.some(e => e.startsWith("/steps/0/action"))).toBe(true);
  });

  it("rejects a non-integer step id", () => {
    const plan = validPlan();
    const result = validatePlanData({
      ...plan,
      steps: [{ id: 1.5, action: "search", params: {} }],
    });
    expect(result.valid).toBe(false);
  });

  it("rejects a zero step id", () => {
    const result = validatePlanData({
      ...validPlan(),
      steps: [{ id: 0, action: "search", params: {} }],
    });
    expect(result.valid).toBe(false);
  });

  it("rejects nested objects inside params", () => {
    const result = validatePlanData({
      ...validPlan(),
      steps: [{ id: 1, action: "search", params: { filter: { year: 2020 } } }],
    });
    expect(result.valid).toBe(false);
  });

  it("rejects additional top-level properties", () => {
    const result = validatePlanData({ ...validPlan(), plan_id: "abc" });
    expect(result.valid).toBe(false);
  });

  it("rejects a string reproducibility flag", () => {
    const result = validatePlanData({
      ...validPlan(),
      constraints: { max_latency_ms: 8000, must_be_reproducible: "yes" },
    });
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/constraints/must_be_reproducible: must be boolean");
  });
});

describe("assertValidPlan", () => {
  it("returns silently for a valid plan", () => {
    expect(() =>
      assertValidPlan({
        goal: "fetch_news",
        original_request: "news",
        steps: [{ id: 1, action: "search", params: { top_k: 5 } }],
        constraints: { max_latency_ms: 8000, must_be_reproducible: true },
      })
    ).not.toThrow();
  });

  it("throws with the collected error messages", () => {
    expect(() => assertValidPlan({ goal: "x" })).toThrow(/^Invalid plan: /);
  });
});
