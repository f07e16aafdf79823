export interface NormalizationRule {
  name: string;
  pattern: RegExp; // must carry the g flag
  replacement: string;
}

/**
 * Volatile-token substitutions, applied in sequence. Each rule sees the
 * output of the previous one, so the order is part of the contract:
 * dotted quads are rewritten before bare integers (otherwise they would
 * come out as `<NUM>.<NUM>.<NUM>.<NUM>`), and whitespace collapsing runs last.
 * Hex literals and drive letters only match on a word boundary: a digit
 * glued to them is left alone by every rule, on every pass.
 */
export const NORMALIZATION_RULES: readonly NormalizationRule[] = [
  {
    name: "timestamp",
    pattern: /\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2}(?:,\d+)?/g,
    replacement: "<TIMESTAMP>",
  },
  { name: "time", pattern: /\b\d{2}:\d{2}:\d{2}\b/g, replacement: "<TIME>" },
  { name: "ipv4", pattern: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g, replacement: "<IP>" },
  { name: "number", pattern: /\b\d+\b/g, replacement: "<NUM>" },
  { name: "hex", pattern: /\b0x[0-9a-fA-F]+\b/g, replacement: "<HEX>" },
  { name: "path", pattern: /\b[A-Za-z]:\\\S+|\/\S+/g, replacement: "<PATH>" },
  { name: "pid", pattern: /\bPID=\d+\b/g, replacement: "PID=<NUM>" },
  { name: "thread", pattern: /\bthread-\d+\b/g, replacement: "thread-<NUM>" },
  { name: "whitespace", pattern: /\s+/g, replacement: " " },
];

export function normalizeMessage(message: string): string {
  let text = message;
  for (const rule of NORMALIZATION_RULES) {
    text = text.replace(rule.pattern, rule.replacement);
  }
  return text.trim();
}
