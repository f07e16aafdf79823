export const SIGNATURE_MAX_LENGTH = 50;

/**
 * Readable grouping key: every char outside [A-Za-z0-9] becomes "_", then
 * the result is cut to 50 chars. Two long messages sharing a 50-char prefix
 * end up under the same key.
 */
export function stableSignature(normalized: string): string {
  return normalized.replace(/[^a-zA-Z0-9]/g, "_").slice(0, SIGNATURE_MAX_LENGTH);
}
