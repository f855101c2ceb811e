/**
 * Pack バリデーター
 * スキーマの宣言順に全フィールドを検証し、エラーをすべて収集する
 */

import { z } from "zod";
import type {
  FieldKind,
  FieldRule,
  ModeDetection,
  PackDocument,
  PackSchema,
  PackValidationError,
  PackValidationResult,
} from "../types/index.js";
import { describeJsonKind } from "./json-kind.js";
import { detectMode } from "./detector.js";
import { GLOBAL_SCHEMA, PACK_SCHEMAS, THREAD_SCHEMA } from "./schemas.js";

// 要素の型は検証しない
const FIELD_KIND_SCHEMAS: Readonly<Record<FieldKind, z.ZodTypeAny>> = {
  string: z.string(),
  list: z.array(z.unknown()),
};

/**
 * 文書をスキーマで検証する
 * @param document - ルート形状チェック済みの文書
 * @param schema - 適用するスキーマ
 */
export function validateAgainst(
  document: PackDocument,
  schema: PackSchema
): PackValidationResult {
  const errors: PackValidationError[] = [];

  for (const field of schema.fields) {
    const error = checkField(document, field, schema);
    if (error) {
      errors.push(error);
    }
  }

  return {
    mode: schema.mode,
    valid: errors.length === 0,
    errors,
  };
}

export function validateGlobal(document: PackDocument): PackValidationResult {
  return validateAgainst(document, GLOBAL_SCHEMA);
}

export function validateThread(document: PackDocument): PackValidationResult {
  return validateAgainst(document, THREAD_SCHEMA);
}

export interface PackCheck {
  detection: ModeDetection;
  result: PackValidationResult;
}

/**
 * モード判定とバリデーションをまとめて行う
 */
export function validatePack(document: PackDocument): PackCheck {
  const detection = detectMode(document);
  return {
    detection,
    result: validateAgainst(document, PACK_SCHEMAS[detection.mode]),
  };
}

function checkField(
  document: PackDocument,
  field: FieldRule,
  schema: PackSchema
): PackValidationError | null {
  const value = Object.hasOwn(document, field.key) ? document[field.key] : undefined;
  if (value === undefined) {
    return {
      code: "MISSING_KEY",
      key: field.key,
      message: `Missing required key: ${field.key}`,
    };
  }

  if (FIELD_KIND_SCHEMAS[field.kind].safeParse(value).success) {
    return null;
  }

  const actual = describeJsonKind(value);
  return {
    code: "TYPE_MISMATCH",
    key: field.key,
    message: `Key '${field.key}' must be ${schema.expectedLabels[field.kind]}, found ${actual}`,
    expected: field.kind,
    actual,
  };
}
