import { decodeLines, type Analyzer, type LogFile } from "@wlr/core";

export interface UploadedLog {
  originalname: string;
  buffer: Buffer;
}

export interface ReportForm {
  language?: unknown;
  topK?: unknown;
  minCount?: unknown;
}

/** Maps the multipart form names onto the analyzer's query fields. */
export function readReportForm(body: unknown): ReportForm {
  if (typeof body !== "object" || body === null) return {};
  const form: Record<string, unknown> = { ...body };
  return { language: form.language, topK: form.top_k, minCount: form.min_count };
}

export function toLogFiles(uploads: readonly UploadedLog[]): LogFile[] {
  return uploads.map((u) => ({ filename: u.originalname, lines: decodeLines(u.buffer) }));
}

export async function buildLogReport(analyzer: Analyzer, uploads: readonly UploadedLog[], body: unknown): Promise<Buffer> {
  return analyzer.report(toLogFiles(uploads), readReportForm(body));
}
