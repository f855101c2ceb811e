/**
 * Pack スキーマ定義
 * global（推論パック）と thread（スレッド固有パック）の 2 種類のみ
 */

import type { FieldRule, PackSchema } from "../types/index.js";

export const GLOBAL_REQUIRED_KEYS = [
  "context_you_should_have_used",
  "thought_process_failures",
  "failure_patterns",
  "grok_strengths_and_limitations",
  "multi_llm_roles",
  "power_user_best_practices",
  "team_of_models_architecture",
  "reasoning_strategy_pack",
] as const;

export const THREAD_STRING_KEYS = [
  "thread_name",
  "primary_goal",
  "niche_or_topic",
] as const;

export const THREAD_LIST_KEYS = [
  "tasks_for_grok",
  "hard_constraints",
  "output_requirements",
  "priority_rules",
] as const;

export const THREAD_REQUIRED_KEYS = [...THREAD_STRING_KEYS, ...THREAD_LIST_KEYS] as const;

function freezeFields(fields: FieldRule[]): readonly FieldRule[] {
  return Object.freeze(fields.map((field) => Object.freeze(field)));
}

// 全フィールドが list
export const GLOBAL_SCHEMA: PackSchema = Object.freeze<PackSchema>({
  mode: "global",
  fields: freezeFields(GLOBAL_REQUIRED_KEYS.map((key): FieldRule => ({ key, kind: "list" }))),
  expectedLabels: Object.freeze({ string: "a string", list: "a list (array)" }),
});

// string グループを先に、list グループを後に検証する
export const THREAD_SCHEMA: PackSchema = Object.freeze<PackSchema>({
  mode: "thread",
  fields: freezeFields([
    ...THREAD_STRING_KEYS.map((key): FieldRule => ({ key, kind: "string" })),
    ...THREAD_LIST_KEYS.map((key): FieldRule => ({ key, kind: "list" })),
  ]),
  expectedLabels: Object.freeze({ string: "a string", list: "a list" }),
});

export const PACK_SCHEMAS: Readonly<Record<PackSchema["mode"], PackSchema>> = Object.freeze({
  global: GLOBAL_SCHEMA,
  thread: THREAD_SCHEMA,
});
