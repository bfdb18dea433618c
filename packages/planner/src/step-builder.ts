import type { GoalTag, Step, StepAction, StepParams } from "@steadyplan/schemas";

export interface StepTemplate {
  readonly action: StepAction;
  /** Builds fresh params on every call; `request` is the verbatim request text. */
  readonly params: (request: string) => StepParams;
}

const templates = (...list: StepTemplate[]): readonly StepTemplate[] =>
  Object.freeze(list.map(template => Object.freeze(template)));

// Frozen: plans depend on the request text alone.
export const STEP_TEMPLATES: Readonly<Record<GoalTag, readonly StepTemplate[]>> = Object.freeze({
  find_papers_and_summarize: templates(
    { action: "search", params: request => ({ source: "scholar_like", query: request, top_k: 3 }) },
    { action: "extract", params: () => ({ fields: ["title", "year", "abstract"] }) },
    { action: "summarize", params: () => ({ style: "concise", max_words: 300 }) },
  ),
  find_papers: templates(
    { action: "search", params: request => ({ source: "scholar_like", query: request, top_k: 5 }) },
  ),
  compare_sources: templates(
    { action: "identify_entities", params: () => ({ from_request: true, max_entities: 4 }) },
    { action: "fetch_facts", params: () => ({ per_entity_top_k: 3 }) },
    { action: "compare", params: () => ({ dimensions: ["pros", "cons", "risks"] }) },
  ),
  generate_report: templates(
    { action: "gather_context", params: request => ({ source: "mixed", query: request }) },
    { action: "outline", params: () => ({ sections: ["introduction", "body", "conclusion"] }) },
    { action: "write", params: () => ({ format: "markdown", target_audience: "general" }) },
  ),
  fetch_news: templates(
    { action: "search", params: request => ({ source: "news_api", query: request, top_k: 5 }) },
    { action: "summarize", params: () => ({ style: "bullet_points", max_items: 5 }) },
  ),
  generic_information_task: templates(
    { action: "search", params: request => ({ source: "web", query: request, top_k: 3 }) },
    { action: "summarize", params: () => ({ style: "short", max_words: 200 }) },
  ),
});

/** Instantiates the templates for `goal`. Ids run 1..n in template order. */
export function buildSteps(goal: GoalTag, request: string): Step[] {
  return STEP_TEMPLATES[goal].map((template, index) => ({
    id: index + 1,
    action: template.action,
    params: template.params(request),
  }));
}
