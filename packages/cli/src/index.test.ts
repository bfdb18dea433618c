/**
 * Tests for the `steadyplan` entry point. index.ts runs on import, so the
 * runner is mocked and the test only checks the wiring.
 */
import { describe, it, expect, vi, afterEach } from "vitest";

const mocks = vi.hoisted(() => ({
  runProgram: vi.fn().mockResolvedValue(0),
  installProcessHandlers: vi.fn(),
}));

vi.mock("dotenv/config", () => ({}));
vi.mock("./main.js", () => mocks);

afterEach(() => {
  process.exitCode = undefined;
});

describe("CLI index.ts module", () => {
  it("installs process handlers and runs the plan program", async () => {
    await import("./index.js");
    expect(mocks.installProcessHandlers).toHaveBeenCalledTimes(1);
    expect(mocks.runProgram).toHaveBeenCalledTimes(1);
    const program = mocks.runProgram.mock.calls[0]![0];
    expect(program.name()).toBe("steadyplan");
  });
});
