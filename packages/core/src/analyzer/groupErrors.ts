import {
  DEFAULT_SEVERITY,
  type ErrorGroup,
  type FileReport,
  type LogFile,
} from "../domain/ErrorGroup.js";
import { getContext } from "../parser/context.js";
import { normalizeMessage } from "../parser/normalize.js";
import { isErrorLine } from "../parser/patterns.js";
import { stableSignature } from "../parser/signature.js";

export interface GroupFilter {
  minCount?: number;
  topK?: number;
}

/** Groups error-like lines by signature, in first-seen order. */
export function parseLogLines(lines: readonly string[]): ErrorGroup[] {
  const groups = new Map<string, ErrorGroup>();

  lines.forEach((raw, i) => {
    const line = raw.replace(/\r?\n$/, "");
    if (!isErrorLine(line)) return;

    const normalizedMessage = normalizeMessage(line);
    const signature = stableSignature(normalizedMessage);

    let group = groups.get(signature);
    if (!group) {
      group = {
        signature,
        normalizedMessage,
        representativeMessage: line.trim(),
        severity: DEFAULT_SEVERITY,
        count: 0,
        occurrences: [],
      };
      groups.set(signature, group);
    }

    group.occurrences.push({
      originalMessage: line.trim(),
      lineNumber: i + 1,
      context: getContext(lines, i),
    });
    group.count += 1;
  });

  return [...groups.values()];
}

/**
 * minCount first, then a stable sort by count (descending), then topK.
 * An absent bound leaves the list alone.
 */
export function applyGroupFilters(groups: readonly ErrorGroup[], filter: GroupFilter = {}): ErrorGroup[] {
  const { minCount, topK } = filter;
  let out = minCount !== undefined ? groups.filter((g) => g.count >= minCount) : [...groups];
  out.sort((a, b) => b.count - a.count);
  if (topK !== undefined) out = out.slice(0, topK);
  return out;
}

export function groupLogFile(file: LogFile, filter: GroupFilter = {}): FileReport {
  return { filename: file.filename, groups: applyGroupFilters(parseLogLines(file.lines), filter) };
}
