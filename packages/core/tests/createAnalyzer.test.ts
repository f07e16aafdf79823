import { describe, expect, it, vi } from "vitest";
import { createAnalyzer } from "../src/analyzer/createAnalyzer.js";
import type { RenderableReport } from "../src/domain/ErrorGroup.js";
import { InputValidationError, RenderError } from "../src/errors.js";
import type { RenderPort, SuggestPort } from "../src/ports/index.js";

const suggester: SuggestPort = {
  async suggest(message, language) {
    return { reformulated: `explained(${language}): ${message}`, solution: "fix it" };
  },
};

const FILES = [
  {
    filename: "managed1.log",
    lines: ["ERROR pool AppDS exhausted after 30 s", "INFO ok", "ERROR pool AppDS exhausted after 45 s", "SEVERE: stuck thread-7"],
  },
  { filename: "managed2.log", lines: ["INFO nothing to see"] },
];

describe("createAnalyzer", () => {
  it("produces one report per file in upload order", async () => {
    const analyzer = createAnalyzer({ suggester });
    const reports = await analyzer.analyze(FILES, { language: "en" });

    expect(reports.map((r) => r.filename)).toEqual(["managed1.log", "managed2.log"]);
    expect(reports[0]?.groups.map((g) => g.count)).toEqual([2, 1]);
    expect(reports[0]?.groups[0]?.reformulatedMessage).toBe(
      "explained(en): ERROR pool AppDS exhausted after 30 s",
    );
    expect(reports[1]?.groups).toEqual([]);
  });

  it("applies topK and minCount from the raw query", async () => {
    const analyzer = createAnalyzer({ suggester });
    const [report] = await analyzer.analyze(FILES.slice(0, 1), { topK: "1", minCount: "1" });
    expect(report?.groups.map((g) => g.normalizedMessage)).toEqual(["ERROR pool AppDS exhausted after <NUM> s"]);
  });

  it("rejects an empty batch before doing any work", async () => {
    const suggest = vi.fn();
    const analyzer = createAnalyzer({ suggester: { suggest } });
    await expect(analyzer.analyze([])).rejects.toBeInstanceOf(InputValidationError);
    expect(suggest).not.toHaveBeenCalled();
  });

  it("rejects bad parameters before doing any work", async () => {
    const suggest = vi.fn();
    const analyzer = createAnalyzer({ suggester: { suggest } });
    await expect(analyzer.analyze(FILES, { topK: "zero" })).rejects.toThrow("Invalid parameters");
    expect(suggest).not.toHaveBeenCalled();
  });

  it("hands report rows to the renderer", async () => {
    const render = vi.fn(async (_reports: RenderableReport[]) => Buffer.from("%PDF-fake"));
    const renderer: RenderPort = { render };
    const analyzer = createAnalyzer({ suggester, renderer });

    const pdf = await analyzer.report(FILES, { language: "fr" });

    expect(pdf.toString()).toBe("%PDF-fake");
    expect(render).toHaveBeenCalledWith(
      [
        {
          filename: "managed1.log",
          rows: [
            {
              message: "explained(fr): ERROR pool AppDS exhausted after 30 s",
              solution: "fix it",
              occurrences: 2,
            },
            { message: "explained(fr): SEVERE: stuck thread-7", solution: "fix it", occurrences: 1 },
          ],
        },
        { filename: "managed2.log", rows: [] },
      ],
      { language: "fr" },
    );
  });

  it("wraps renderer failures in RenderError", async () => {
    const error = vi.fn();
    const analyzer = createAnalyzer({
      suggester,
      renderer: {
        async render() {
          throw new Error("font missing");
        },
      },
      logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error },
    });

    await expect(analyzer.report(FILES)).rejects.toThrow("Report rendering failed: font missing");
    expect(error).toHaveBeenCalledWith("report rendering failed", { error: "font missing" });
  });
});
