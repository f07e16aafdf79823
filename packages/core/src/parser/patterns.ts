// Evaluated in order; the first hit short-circuits.
export const ERROR_PATTERNS: readonly RegExp[] = [
  /\bERROR\b/,
  /\bException\b/,
  /\bFATAL\b/,
  /\bSEVERE\b/,
  /Traceback \(most recent call last\):/,
  /\bCaused by:/,
];

export function isErrorLine(line: string): boolean {
  return ERROR_PATTERNS.some((p) => p.test(line));
}
