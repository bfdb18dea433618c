export { canonicalize } from "./canonical.js";
export { runTrials, compareReproducibility } from "./harness.js";
export type { TrialResult, ReproducibilityInput, ReproducibilityReport } from "./harness.js";
