// Pure formatting for the reproducibility report. No side effects.
import type { ReproducibilityReport } from "@steadyplan/repro";

// ANSI color helpers
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

const plain = (s: string): string => s;

export interface FormatOptions {
  color?: boolean;
}

export function formatReport(report: ReproducibilityReport, opts: FormatOptions = {}): string {
  const ok = opts.color ? green : plain;
  const fail = opts.color ? red : plain;
  const warn = opts.color ? yellow : plain;
  const heading = opts.color ? bold : plain;
  const runs = `over ${report.trials} run(s)`;

  const lines = [
    "Request:",
    `  ${report.request}`,
    "",
    `Trials: ${report.trials}`,
    "",
    heading("=== Results ==="),
    `Deterministic planner: ${report.deterministicDistinct} distinct plan(s) ${runs}.`,
    `Baseline planner:      ${report.baselineDistinct} distinct plan(s) ${runs}.`,
    "",
    report.deterministicReproducible
      ? `${ok("PASS")} Deterministic planner is fully reproducible for this request.`
      : `${fail("FAIL")} Deterministic planner produced more than one plan (unexpected).`,
    report.baselineDrifted
      ? `${ok("PASS")} Baseline planner drifted between runs (as expected).`
      : `${warn("WARN")} Baseline planner produced a single plan in this sample (may be chance).`,
  ];
  return lines.join("\n") + "\n";
}
