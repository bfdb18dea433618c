import { describe, it, expect } from "vitest";
import {
  classifyGoal,
  buildSteps,
  buildPlan,
  DeterministicPlanner,
  DriftPlanner,
  RemotePlanner,
  createPlanner,
  createSeededRandom,
} from "./index.js";

describe("planner barrel exports", () => {
  it("exports all expected classes and functions", () => {
    expect(classifyGoal).toBeTypeOf("function");
    expect(buildSteps).toBeTypeOf("function");
    expect(buildPlan).toBeTypeOf("function");
    expect(DeterministicPlanner).toBeTypeOf("function");
    expect(DriftPlanner).toBeTypeOf("function");
    expect(RemotePlanner).toBeTypeOf("function");
    expect(createPlanner).toBeTypeOf("function");
    expect(createSeededRandom).toBeTypeOf("function");
  });

  it("DriftPlanner can be instantiated with a seeded source", () => {
    const planner = new DriftPlanner({ random: createSeededRandom(3) });
    expect(planner.generate).toBeTypeOf("function");
  });
});
