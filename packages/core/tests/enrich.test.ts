import { describe, expect, it, vi } from "vitest";
import { enrichGroups } from "../src/analyzer/enrich.js";
import { parseLogLines } from "../src/analyzer/groupErrors.js";
import type { SuggestPort } from "../src/ports/index.js";

const LINES = ["ERROR first problem", "SEVERE: second problem", "FATAL third problem"];

describe("enrichGroups", () => {
  it("keeps the representative message and adds the reformulation", async () => {
    const suggester: SuggestPort = {
      suggest: vi.fn(async (message: string, language: string) => ({
        reformulated: `[${language}] ${message}`,
        solution: "restart",
      })),
    };

    const groups = await enrichGroups(parseLogLines(LINES), suggester, "en");

    expect(suggester.suggest).toHaveBeenCalledTimes(3);
    expect(suggester.suggest).toHaveBeenNthCalledWith(1, "ERROR first problem", "en");
    expect(groups[0]?.representativeMessage).toBe("ERROR first problem");
    expect(groups[0]?.reformulatedMessage).toBe("[en] ERROR first problem");
    expect(groups[0]?.solution).toBe("restart");
  });

  it("preserves group order when calls finish out of order", async () => {
    const delays: Record<string, number> = {
      "ERROR first problem": 30,
      "SEVERE: second problem": 0,
      "FATAL third problem": 10,
    };
    const suggester: SuggestPort = {
      async suggest(message) {
        await new Promise((r) => setTimeout(r, delays[message] ?? 0));
        return { reformulated: message.toUpperCase(), solution: "" };
      },
    };

    const groups = await enrichGroups(parseLogLines(LINES), suggester, "fr", { concurrency: 3 });

    expect(groups.map((g) => g.reformulatedMessage)).toEqual([
      "ERROR FIRST PROBLEM",
      "SEVERE: SECOND PROBLEM",
      "FATAL THIRD PROBLEM",
    ]);
  });

  it("never runs more calls than the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const suggester: SuggestPort = {
      async suggest(message) {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((r) => setTimeout(r, 5));
        inFlight -= 1;
        return { reformulated: message, solution: "" };
      },
    };

    await enrichGroups(parseLogLines(LINES), suggester, "fr", { concurrency: 2 });
    expect(peak).toBe(2);

    peak = 0;
    await enrichGroups(parseLogLines(LINES), suggester, "fr");
    expect(peak).toBe(1);
  });

  it("turns a rejecting suggester into a fallback answer", async () => {
    const warn = vi.fn();
    const logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
    const suggester: SuggestPort = {
      async suggest() {
        throw new Error("quota exceeded");
      },
    };

    const [group] = await enrichGroups(parseLogLines(["ERROR boom"]), suggester, "en", { logger });

    expect(group?.reformulatedMessage).toBe("Suggestion failed: quota exceeded");
    expect(group?.solution).toBe("Suggestion failed: quota exceeded");
    expect(warn).toHaveBeenCalledWith("suggester rejected, using fallback", {
      signature: "ERROR_boom",
      reason: "quota exceeded",
    });
  });

  it("writes the fallback answer in the requested language", async () => {
    const suggester: SuggestPort = {
      async suggest() {
        throw new Error("quota exceeded");
      },
    };

    const [fr] = await enrichGroups(parseLogLines(["ERROR boom"]), suggester, "fr");
    const [frCA] = await enrichGroups(parseLogLines(["ERROR boom"]), suggester, "fr-CA");
    const [de] = await enrichGroups(parseLogLines(["ERROR boom"]), suggester, "de");

    expect(fr?.reformulatedMessage).toBe("Échec de la suggestion: quota exceeded");
    expect(fr?.solution).toBe("Échec de la suggestion: quota exceeded");
    expect(frCA?.solution).toBe("Échec de la suggestion: quota exceeded");
    expect(de?.solution).toBe("Suggestion failed: quota exceeded");
  });

  it("returns an empty list without calling the suggester", async () => {
    const suggest = vi.fn();
    expect(await enrichGroups([], { suggest }, "fr")).toEqual([]);
    expect(suggest).not.toHaveBeenCalled();
  });
});
