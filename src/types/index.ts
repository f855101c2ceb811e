/**
 * 型定義のエクスポート
 */

export type {
  JsonKind,
  PackDocument,
  PackMode,
  FieldKind,
  FieldRule,
  PackSchema,
  PackValidationErrorCode,
  PackValidationError,
  PackValidationResult,
  ModeWarning,
  ModeDetection,
} from "./pack.js";
