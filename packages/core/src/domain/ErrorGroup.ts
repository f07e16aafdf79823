export type Severity = "LOW" | "MEDIUM" | "HIGH";

export const DEFAULT_SEVERITY: Severity = "MEDIUM";

/** One matched line inside a log file */
export interface Occurrence {
  originalMessage: string; // raw line, trimmed
  lineNumber: number; // 1-based
  context: string; // surrounding raw lines joined with "\n"
}

/** One distinct normalized error shape within a single file */
export interface ErrorGroup {
  signature: string; // stable grouping key
  normalizedMessage: string; // text the signature was derived from
  representativeMessage: string; // first occurrence, untouched by enrichment
  reformulatedMessage?: string; // LLM explanation, set by enrichment
  solution?: string; // LLM fix, set by enrichment
  severity: Severity;
  count: number; // always occurrences.length
  occurrences: Occurrence[];
}

export interface LogFile {
  filename: string;
  lines: string[];
}

export interface FileReport {
  filename: string;
  groups: ErrorGroup[];
}

export interface Suggestion {
  reformulated: string; // e.g., "The JDBC pool could not reach the database host"
  solution: string; // e.g., "Check the data source URL and listener status"
}

/** Row shape handed to a renderer */
export interface ReportRow {
  message: string;
  solution: string;
  occurrences: number;
}

export interface RenderableReport {
  filename: string;
  rows: ReportRow[];
}
