/**
 * テスト用の Pack 文書
 */

import type { PackDocument } from "../../src/types/index.js";

export function validGlobalPack(): PackDocument {
  return {
    context_you_should_have_used: ["prior thread summary"],
    thought_process_failures: [],
    failure_patterns: [{ name: "overconfidence" }],
    grok_strengths_and_limitations: ["fast drafts"],
    multi_llm_roles: [],
    power_user_best_practices: ["state constraints first"],
    team_of_models_architecture: [],
    reasoning_strategy_pack: [1, 2, 3],
  };
}

export function validThreadPack(): PackDocument {
  return {
    thread_name: "Dessert shop research",
    primary_goal: "Find a niche",
    niche_or_topic: "Desserts",
    tasks_for_grok: ["list competitors"],
    hard_constraints: [],
    output_requirements: ["tables"],
    priority_rules: ["no made-up numbers"],
  };
}

export function withoutKey(document: PackDocument, key: string): PackDocument {
  const copy: PackDocument = { ...document };
  delete copy[key];
  return copy;
}
