/**
 * Report モジュール
 */

export { formatReport, formatWarning, formatFatal } from "./formatter.js";
export type { ReportLines } from "./formatter.js";
