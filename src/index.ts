/**
 * pack-lint - Reasoning pack JSON shape checker
 * @module pack-lint
 */

// Types
export * from "./types/index.js";

// Pack
export {
  loadPackFile,
  parsePackJson,
  decodePackText,
  ensurePackObject,
  PackLoadError,
  detectMode,
  validatePack,
  validateAgainst,
  validateGlobal,
  validateThread,
  jsonKindOf,
  describeJsonKind,
  GLOBAL_SCHEMA,
  THREAD_SCHEMA,
  PACK_SCHEMAS,
  GLOBAL_REQUIRED_KEYS,
  THREAD_REQUIRED_KEYS,
  THREAD_STRING_KEYS,
  THREAD_LIST_KEYS,
} from "./pack/index.js";
export type { PackLoadErrorCode, PackCheck } from "./pack/index.js";

// Report
export { formatReport, formatWarning, formatFatal } from "./report/index.js";
export type { ReportLines } from "./report/index.js";

// CLI
export { runCli, processOutput, USAGE } from "./cli/run.js";
export type { CliOutput } from "./cli/run.js";
