/**
 * Pack モード判定
 * キー集合との重なりだけで判定し、値や型は見ない
 */

import type { ModeDetection, PackDocument, PackSchema } from "../types/index.js";
import { GLOBAL_SCHEMA, THREAD_SCHEMA } from "./schemas.js";

function hasAnyKey(keys: ReadonlySet<string>, schema: PackSchema): boolean {
  return schema.fields.some((field) => keys.has(field.key));
}

/**
 * 文書に適用するモードを判定する
 *
 * | global | thread | mode   | warning      |
 * |--------|--------|--------|--------------|
 * | yes    | no     | global | -            |
 * | no     | yes    | thread | -            |
 * | yes    | yes    | global | MIXED_KEYS   |
 * | no     | no     | global | UNDETERMINED |
 */
export function detectMode(document: PackDocument): ModeDetection {
  const keys = new Set(Object.keys(document));
  const hasGlobal = hasAnyKey(keys, GLOBAL_SCHEMA);
  const hasThread = hasAnyKey(keys, THREAD_SCHEMA);

  if (hasGlobal && !hasThread) {
    return { mode: "global" };
  }
  if (hasThread && !hasGlobal) {
    return { mode: "thread" };
  }
  if (hasGlobal && hasThread) {
    return { mode: "global", warning: "MIXED_KEYS" };
  }
  return { mode: "global", warning: "UNDETERMINED" };
}
