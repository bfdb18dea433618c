export const DEFAULT_REQUEST =
  "Find 3 recent papers on deterministic AI agents and summarize the key patterns.";
export const DEFAULT_TRIALS = 10;

export interface CliConfig {
  /** Request used by the reproducibility report when none is given. */
  request: string;
  trials: number;
  /** Seed for the baseline planner; unseeded draws use Math.random. */
  seed?: number;
}

export function parsePositiveInt(value: string, label: string): number {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

export function parseSeed(value: string, label = "seed"): number {
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n) || n < 0 || n > 0xffffffff) {
    throw new Error(`Invalid ${label}: "${value}" (must be an integer between 0 and 4294967295)`);
  }
  return n;
}

/** Reads STEADYPLAN_* variables. Entry points load `.env` before calling this. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const config: CliConfig = {
    request: env.STEADYPLAN_REQUEST ?? DEFAULT_REQUEST,
    trials: env.STEADYPLAN_TRIALS !== undefined
      ? parsePositiveInt(env.STEADYPLAN_TRIALS, "STEADYPLAN_TRIALS")
      : DEFAULT_TRIALS,
  };
  if (env.STEADYPLAN_SEED !== undefined && env.STEADYPLAN_SEED !== "") {
    config.seed = parseSeed(env.STEADYPLAN_SEED, "STEADYPLAN_SEED");
  }
  return config;
}
