import type { GoalTag } from "@steadyplan/schemas";

export interface GoalRule {
  tag: GoalTag;
  /** Receives the case-folded request. */
  matches: (text: string) => boolean;
}

export const FALLBACK_GOAL: GoalTag = "generic_information_task";

const containsAny = (text: string, needles: string[]): boolean =>
  needles.some(n => text.includes(n));

const mentionsLiterature = (text: string): boolean =>
  containsAny(text, ["paper", "journal", "research"]);

// Order matters: several rules can match the same text and only the first one counts.
export const GOAL_RULES: readonly GoalRule[] = [
  { tag: "find_papers_and_summarize", matches: t => mentionsLiterature(t) && t.includes("summar") },
  { tag: "find_papers", matches: mentionsLiterature },
  { tag: "compare_sources", matches: t => containsAny(t, ["compare", "vs"]) },
  { tag: "generate_report", matches: t => t.includes("report") && t.includes("generate") },
  { tag: "fetch_news", matches: t => t.includes("news") },
];

export function classifyGoal(request: string, rules: readonly GoalRule[] = GOAL_RULES): GoalTag {
  const lower = request.toLowerCase();
  for (const rule of rules) {
    if (rule.matches(lower)) return rule.tag;
  }
  return FALLBACK_GOAL;
}
