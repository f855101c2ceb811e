/**
 * Pack 文書の型定義
 *
 * ## 検出 Law（不変条件）
 *
 * - `GLOBAL_SCHEMA.fields[].key ∩ THREAD_SCHEMA.fields[].key = ∅`
 * - 両方のキーを含む文書は拒否せず、global として扱う
 *
 * @grounding detectMode() / validatePack() で使用
 */

/** JSON 値の種別タグ */
export type JsonKind = "null" | "boolean" | "number" | "string" | "list" | "object";

/**
 * ルートが object であることを確認済みの文書
 * 値は JSON.parse の結果そのままで、ルート以外は走査しない
 */
export type PackDocument = Record<string, unknown>;

/** 適用するスキーマの種別 */
export type PackMode = "global" | "thread";

/** フィールドに期待する値の種別 */
export type FieldKind = "string" | "list";

export interface FieldRule {
  key: string;
  kind: FieldKind;
}

/**
 * 平坦なスキーマ記述子
 * fields の宣言順がそのままエラーの報告順になる
 */
export interface PackSchema {
  mode: PackMode;
  fields: readonly FieldRule[];
  /** 種別不一致メッセージに使う期待型の表記 */
  expectedLabels: Readonly<Record<FieldKind, string>>;
}

export type PackValidationErrorCode = "MISSING_KEY" | "TYPE_MISMATCH";

export interface PackValidationError {
  code: PackValidationErrorCode;
  key: string;
  /** レポートに出力する 1 行分のメッセージ */
  message: string;
  expected?: FieldKind;
  actual?: string;
}

export interface PackValidationResult {
  mode: PackMode;
  valid: boolean;
  errors: PackValidationError[];
}

/** モード判定が曖昧だった理由 */
export type ModeWarning = "MIXED_KEYS" | "UNDETERMINED";

export interface ModeDetection {
  mode: PackMode;
  warning?: ModeWarning;
}
