import type { FileReport, LogFile } from "../domain/ErrorGroup.js";
import type { ProcessLogQuery } from "../config/query.js";
import type { LoggerPort, SuggestPort } from "../ports/index.js";
import { enrichGroups } from "./enrich.js";
import { groupLogFile } from "./groupErrors.js";

export interface PipelineDeps {
  suggester: SuggestPort;
  logger: LoggerPort;
  enrichConcurrency: number;
}

export async function runPipeline(
  files: readonly LogFile[],
  query: ProcessLogQuery,
  deps: PipelineDeps,
): Promise<FileReport[]> {
  const reports: FileReport[] = [];

  // files are handled one after the other, in upload order
  for (const file of files) {
    // 1) group + filter/rank
    const { groups } = groupLogFile(file, { minCount: query.minCount, topK: query.topK });
    deps.logger.info("log file grouped", {
      filename: file.filename,
      lines: file.lines.length,
      groups: groups.length,
    });

    // 2) enrichment (LLM explanation + fix)
    const enriched = await enrichGroups(groups, deps.suggester, query.language, {
      concurrency: deps.enrichConcurrency,
      logger: deps.logger,
    });

    reports.push({ filename: file.filename, groups: enriched });
  }

  return reports;
}
