import type { ErrorGroup, FileReport, RenderableReport, ReportRow } from "../domain/ErrorGroup.js";

export function toReportRow(group: ErrorGroup): ReportRow {
  return {
    message: group.reformulatedMessage ?? group.representativeMessage,
    solution: group.solution ?? "",
    occurrences: group.count,
  };
}

export function toRenderableReports(reports: readonly FileReport[]): RenderableReport[] {
  return reports.map((r) => ({ filename: r.filename, rows: r.groups.map(toReportRow) }));
}
