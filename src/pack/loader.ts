/**
 * Pack JSON ローダー
 * ファイル読み込み、JSON 構文チェック、ルート形状チェックを行う
 */

import * as fs from "node:fs/promises";
import { z } from "zod";
import type { PackDocument } from "../types/index.js";
import { describeJsonKind } from "./json-kind.js";

export type PackLoadErrorCode =
  | "FILE_NOT_FOUND"
  | "READ_FAILED"
  | "INVALID_ENCODING"
  | "INVALID_JSON"
  | "INVALID_ROOT";

/**
 * 読み込みエラー
 * いずれも致命的で、検証には進まない
 */
export class PackLoadError extends Error {
  constructor(
    public readonly code: PackLoadErrorCode,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "PackLoadError";
  }
}

// =============================================================================
// Zod スキーマ定義
// =============================================================================

// ルートのみ検証する。値の種別はバリデーターがフィールド単位で見る
const PackDocumentSchema = z.record(z.unknown());

// =============================================================================
// 読み込み関数
// =============================================================================

/**
 * JSON 文字列をパースする
 * @param text - ファイル内容
 * @param source - エラーメッセージに含めるパス
 * @throws PackLoadError - 構文エラー時
 */
export function parsePackJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PackLoadError(
      "INVALID_JSON",
      `${source}: invalid JSON syntax:\n  ${reason}`,
      error
    );
  }
}

/**
 * バイト列を UTF-8 として厳密にデコードする
 * 不正なバイトを U+FFFD に置き換えず、エラーにする
 * @throws PackLoadError - UTF-8 として不正な場合
 */
export function decodePackText(bytes: Uint8Array, source: string): string {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new PackLoadError(
      "INVALID_ENCODING",
      `${source}: file is not valid UTF-8`,
      error
    );
  }
}

/**
 * ルートが object であることを確認する
 * モード判定はキーの列挙を前提とするため、必ず判定前に呼ぶこと
 * @throws PackLoadError - ルートが object 以外の場合
 */
export function ensurePackObject(value: unknown): PackDocument {
  const result = PackDocumentSchema.safeParse(value);
  if (!result.success) {
    throw new PackLoadError(
      "INVALID_ROOT",
      `Root JSON must be an object, found ${describeJsonKind(value)}`
    );
  }
  return result.data;
}

/**
 * ファイルから Pack 文書を読み込む
 * @param filePath - JSON ファイルのパス（UTF-8）
 * @throws PackLoadError - 読み込み・文字コード・構文・形状エラー時
 */
export async function loadPackFile(filePath: string): Promise<PackDocument> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new PackLoadError("FILE_NOT_FOUND", `File not found: ${filePath}`, error);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new PackLoadError(
      "READ_FAILED",
      `Failed to read file: ${filePath} (${reason})`,
      error
    );
  }

  const content = decodePackText(bytes, filePath);
  return ensurePackObject(parsePackJson(content, filePath));
}
