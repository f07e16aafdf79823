import type { FileReport, LogFile } from "../domain/ErrorGroup.js";
import { parseProcessLogQuery, type ProcessLogQuery } from "../config/query.js";
import { InputValidationError, RenderError } from "../errors.js";
import { silentLogger, type LoggerPort, type RenderPort, type SuggestPort } from "../ports/index.js";
import { runPipeline } from "./pipeline.js";
import { toRenderableReports } from "./rows.js";

export interface AnalyzerConfig {
  suggester?: SuggestPort;
  renderer?: RenderPort;
  logger?: LoggerPort;
  enrichConcurrency?: number; // default: 1
}

export interface Analyzer {
  /** Groups and enriches every file; `rawQuery` is validated first. */
  analyze(files: LogFile[], rawQuery?: unknown): Promise<FileReport[]>;
  /** Same as analyze, then hands the rows to the renderer. */
  report(files: LogFile[], rawQuery?: unknown): Promise<Buffer>;
}

// --- defaults ---
const noopSuggester: SuggestPort = {
  async suggest(message) {
    return { reformulated: message, solution: "" };
  },
};

const missingRenderer: RenderPort = {
  async render() {
    throw new Error("no renderer configured");
  },
};

export function createAnalyzer(cfg: AnalyzerConfig = {}): Analyzer {
  const suggester = cfg.suggester ?? noopSuggester;
  const renderer = cfg.renderer ?? missingRenderer;
  const logger = cfg.logger ?? silentLogger;
  const enrichConcurrency = Math.max(1, cfg.enrichConcurrency ?? 1);

  async function run(files: LogFile[], rawQuery: unknown): Promise<{ reports: FileReport[]; query: ProcessLogQuery }> {
    if (files.length === 0) throw new InputValidationError("No files uploaded");
    const query = parseProcessLogQuery(rawQuery);
    const reports = await runPipeline(files, query, { suggester, logger, enrichConcurrency });
    return { reports, query };
  }

  return {
    async analyze(files, rawQuery) {
      return (await run(files, rawQuery)).reports;
    },

    async report(files, rawQuery) {
      const { reports, query } = await run(files, rawQuery);
      try {
        return await renderer.render(toRenderableReports(reports), { language: query.language });
      } catch (err) {
        logger.error("report rendering failed", { error: err instanceof Error ? err.message : String(err) });
        throw new RenderError(err);
      }
    },
  };
}
