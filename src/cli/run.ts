/**
 * pack-lint CLI 本体
 * 引数解析 → 読み込み → モード判定 → 検証 → レポート
 */

import { loadPackFile, PackLoadError, validatePack } from "../pack/index.js";
import { formatFatal, formatReport, formatWarning } from "../report/index.js";

export const USAGE = "Usage: pack-lint <path/to/file.json>";

/**
 * 出力先
 * 1 行ずつ受け取り、改行は出力側で付与する
 */
export interface CliOutput {
  stdout(line: string): void;
  stderr(line: string): void;
}

export const processOutput: CliOutput = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

type ParsedArgs = { kind: "help" } | { kind: "validate"; filePath: string };

class CliError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "CliError";
  }
}

function parseArgs(args: string[]): ParsedArgs {
  const [first] = args;
  if (args.length !== 1 || first === undefined) {
    throw new CliError("INVALID_INPUT", USAGE);
  }
  if (first === "--help" || first === "-h") {
    return { kind: "help" };
  }
  return { kind: "validate", filePath: first };
}

/**
 * CLI を 1 回実行する
 * @param args - process.argv.slice(2) 相当
 * @returns 終了コード（0: 成功、1: いずれかの失敗）
 */
export async function runCli(
  args: string[],
  output: CliOutput = processOutput
): Promise<0 | 1> {
  try {
    const parsed = parseArgs(args);
    if (parsed.kind === "help") {
      output.stdout(USAGE);
      return 0;
    }

    const document = await loadPackFile(parsed.filePath);
    const { detection, result } = validatePack(document);
    if (detection.warning) {
      output.stderr(formatWarning(detection.warning));
    }

    const report = formatReport(parsed.filePath, result);
    report.stdout.forEach((line) => output.stdout(line));
    report.stderr.forEach((line) => output.stderr(line));
    return report.exitCode;
  } catch (error) {
    if (error instanceof CliError) {
      output.stderr(error.message);
      return 1;
    }
    if (error instanceof PackLoadError) {
      output.stderr(formatFatal(error.message));
      return 1;
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    output.stderr(formatFatal(message));
    return 1;
  }
}
