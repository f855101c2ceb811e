/**
 * Pack モジュール
 * JSON 読み込み、モード判定、バリデーション
 */

export { loadPackFile, parsePackJson, decodePackText, ensurePackObject, PackLoadError } from "./loader.js";
export type { PackLoadErrorCode } from "./loader.js";
export { detectMode } from "./detector.js";
export { validatePack, validateAgainst, validateGlobal, validateThread } from "./validator.js";
export type { PackCheck } from "./validator.js";
export { jsonKindOf, describeJsonKind } from "./json-kind.js";
export {
  GLOBAL_SCHEMA,
  THREAD_SCHEMA,
  PACK_SCHEMAS,
  GLOBAL_REQUIRED_KEYS,
  THREAD_REQUIRED_KEYS,
  THREAD_STRING_KEYS,
  THREAD_LIST_KEYS,
} from "./schemas.js";
