/**
 * JSON 値の種別判定
 * エラーメッセージに出す型名は、この種別タグからのみ生成する
 */

import type { JsonKind } from "../types/index.js";

/**
 * JSON.parse の結果に対する種別タグ
 * undefined や関数は JSON から生じないため object 扱い
 */
export function jsonKindOf(value: unknown): JsonKind {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  switch (typeof value) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    case "string":
      return "string";
    default:
      return "object";
  }
}

const KIND_LABELS: Readonly<Record<Exclude<JsonKind, "number">, string>> = {
  null: "null",
  boolean: "bool",
  string: "str",
  list: "list",
  object: "dict",
};

/**
 * レポート用の型名
 * number は整数かどうかで int / float に分ける
 * JSON.parse 後の値で判定するため、`1.0` や `1e5` も int になる
 */
export function describeJsonKind(value: unknown): string {
  const kind = jsonKindOf(value);
  if (kind === "number") {
    return Number.isInteger(value) ? "int" : "float";
  }
  return KIND_LABELS[kind];
}
