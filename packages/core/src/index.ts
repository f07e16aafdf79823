export * from "./domain/ErrorGroup.js";
export * from "./errors.js";
export * from "./ports/index.js";
export { ERROR_PATTERNS, isErrorLine } from "./parser/patterns.js";
export { NORMALIZATION_RULES, normalizeMessage, type NormalizationRule } from "./parser/normalize.js";
export { SIGNATURE_MAX_LENGTH, stableSignature } from "./parser/signature.js";
export { DEFAULT_CONTEXT_AFTER, DEFAULT_CONTEXT_BEFORE, getContext } from "./parser/context.js";
export { decodeLines, readLogLines } from "./io/readLines.js";
export {
  DEFAULT_LANGUAGE,
  parseProcessLogQuery,
  processLogQuerySchema,
  type ProcessLogQuery,
} from "./config/query.js";
export { applyGroupFilters, groupLogFile, parseLogLines, type GroupFilter } from "./analyzer/groupErrors.js";
export { enrichGroups, type EnrichOptions } from "./analyzer/enrich.js";
export { toReportRow, toRenderableReports } from "./analyzer/rows.js";
export { runPipeline, type PipelineDeps } from "./analyzer/pipeline.js";
export { createAnalyzer, type Analyzer, type AnalyzerConfig } from "./analyzer/createAnalyzer.js";
