import type { ErrorGroup, Suggestion } from "../domain/ErrorGroup.js";
import { silentLogger, type LoggerPort } from "../ports/LoggerPort.js";
import type { SuggestPort } from "../ports/SuggestPort.js";

export interface EnrichOptions {
  concurrency?: number; // default: 1 (one call at a time)
  logger?: LoggerPort;
}

async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  if (items.length === 0) return;

  let nextIndex = 0;
  const workerCount = Math.min(Math.max(1, concurrency), items.length);

  const workers = Array.from({ length: workerCount }, async () => {
    while (nextIndex < items.length) {
      const current = nextIndex++;
      await worker(items[current], current);
    }
  });

  await Promise.all(workers);
}

function rejectedSuggestion(reason: string, language: string): Suggestion {
  const text = language.toLowerCase().startsWith("fr")
    ? `Échec de la suggestion: ${reason}`
    : `Suggestion failed: ${reason}`;
  return { reformulated: text, solution: text };
}

/**
 * Asks the suggester about every group's representative message. The
 * returned array keeps the input order whatever the concurrency.
 */
export async function enrichGroups(
  groups: readonly ErrorGroup[],
  suggester: SuggestPort,
  language: string,
  opts: EnrichOptions = {},
): Promise<ErrorGroup[]> {
  const logger = opts.logger ?? silentLogger;
  const enriched: ErrorGroup[] = [...groups];

  await runWithConcurrency(groups, opts.concurrency ?? 1, async (group, index) => {
    let answer: Suggestion;
    try {
      answer = await suggester.suggest(group.representativeMessage, language);
    } catch (err) {
      // suggesters are not supposed to reject; keep the report going if one does
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn("suggester rejected, using fallback", { signature: group.signature, reason });
      answer = rejectedSuggestion(reason, language);
    }
    enriched[index] = { ...group, reformulatedMessage: answer.reformulated, solution: answer.solution };
  });

  return enriched;
}
