/**
 * Report generation module.
 * Deterministic; makes no LLM calls.
 * Transforms run and batch results into markdown + JSON artifacts.
 */

export {
  batchExitCode,
  exitCodeFor,
  EXIT_CODES,
  formatDuration,
  generateBatchJSON,
  generateBatchMarkdown,
  generateMarkdown,
  generateRunJSON,
  REPORT_VERSION,
  serializeJSON,
} from './reporter.js';
export type { BatchReportDocument, RunReportDocument } from './reporter.js';
