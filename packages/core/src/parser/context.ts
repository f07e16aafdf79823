export const DEFAULT_CONTEXT_BEFORE = 3;
export const DEFAULT_CONTEXT_AFTER = 3;

export function getContext(
  lines: readonly string[],
  index: number,
  before = DEFAULT_CONTEXT_BEFORE,
  after = DEFAULT_CONTEXT_AFTER,
): string {
  const start = Math.max(0, index - before);
  const end = Math.min(lines.length, index + after + 1);
  return lines.slice(start, end).join("\n");
}
