#!/usr/bin/env node
/**
 * pack-lint CLI
 * global / thread パック JSON の形状チェック
 */

import { formatFatal } from "../report/index.js";
import { runCli } from "./run.js";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : "Unknown error";
    process.stderr.write(`${formatFatal(message)}\n`);
    process.exit(1);
  });
