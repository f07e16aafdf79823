import type { Suggestion } from "../domain/ErrorGroup.js";

/**
 * Explains one error message and proposes a fix. Implementations resolve
 * with a readable fallback instead of rejecting.
 */
export interface SuggestPort {
  suggest(message: string, language: string): Promise<Suggestion>;
}
