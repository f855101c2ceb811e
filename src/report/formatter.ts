/**
 * 検証結果のテキスト整形
 */

import type { ModeWarning, PackMode, PackValidationResult } from "../types/index.js";

export interface ReportLines {
  /** 標準出力に書く行 */
  stdout: string[];
  /** 標準エラーに書く行 */
  stderr: string[];
  exitCode: 0 | 1;
}

const WARNING_MESSAGES: Readonly<Record<ModeWarning, string>> = {
  MIXED_KEYS:
    "[WARN] JSON contains keys from both GLOBAL and THREAD schemas; treating as GLOBAL for validation.",
  UNDETERMINED: "[WARN] Could not determine schema type; assuming GLOBAL.",
};

export function formatWarning(warning: ModeWarning): string {
  return WARNING_MESSAGES[warning];
}

export function formatFatal(message: string): string {
  return `[ERROR] ${message}`;
}

function modeLabel(mode: PackMode): string {
  return mode.toUpperCase();
}

/**
 * 検証結果をレポート行に変換する
 * エラーなしなら成功行 1 行、ありならヘッダーとエラー箇条書き
 */
export function formatReport(filePath: string, result: PackValidationResult): ReportLines {
  if (result.errors.length === 0) {
    return {
      stdout: [`[OK] ${filePath} is valid ${modeLabel(result.mode)} JSON.`],
      stderr: [],
      exitCode: 0,
    };
  }

  return {
    stdout: [],
    stderr: [
      `[FAIL] ${filePath} failed ${modeLabel(result.mode)} validation:`,
      ...result.errors.map((error) => `  - ${error.message}`),
    ],
    exitCode: 1,
  };
}
