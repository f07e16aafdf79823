import { GoogleGenerativeAI } from "@google/generative-ai";
import type { SuggestPort, Suggestion } from "@wlr/core";
import { z } from "zod";

/** The slice of a Gemini model this adapter calls. */
export interface ContentModel {
  generateContent(prompt: string, opts?: { signal?: AbortSignal }): Promise<{ response: { text(): string } }>;
}

export interface GeminiSuggesterOptions {
  apiKey?: string;            // default: process.env.GEMINI_API_KEY
  model?: string;             // default: process.env.GEMINI_MODEL || "gemini-2.5-flash"
  temperature?: number;       // default: 0.2
  maxRetries?: number;        // default: 2
  timeoutMs?: number;         // default: 15000
  retryBaseDelayMs?: number;  // default: 200
  client?: ContentModel;      // allow DI for tests
}

const answerSchema = z.object({
  reformulated: z.string().min(1),
  solution: z.string().min(1),
});

export interface FallbackTexts {
  disabled: Suggestion;
  empty: Suggestion;
  failure(reason: string): Suggestion;
}

const FALLBACKS: Record<"fr" | "en", FallbackTexts> = {
  fr: {
    disabled: {
      reformulated: "⚠ Gemini désactivé, impossible de reformuler.",
      solution: "⚠ Vérifier la clé API GEMINI_API_KEY.",
    },
    empty: {
      reformulated: "Aucune reformulation reçue",
      solution: "Vérifier le message et le contexte manuellement",
    },
    failure: (reason) => ({ reformulated: `Échec Gemini: ${reason}`, solution: `Échec Gemini: ${reason}` }),
  },
  en: {
    disabled: {
      reformulated: "⚠ Gemini disabled, cannot reformulate.",
      solution: "⚠ Check the GEMINI_API_KEY setting.",
    },
    empty: {
      reformulated: "No reformulation received",
      solution: "Check the message and its context manually",
    },
    failure: (reason) => ({ reformulated: `Gemini failure: ${reason}`, solution: `Gemini failure: ${reason}` }),
  },
};

export function fallbackFor(language: string): FallbackTexts {
  return language.toLowerCase().startsWith("fr") ? FALLBACKS.fr : FALLBACKS.en;
}

export function makeGeminiSuggester(opts: GeminiSuggesterOptions = {}): SuggestPort {
  const apiKey = opts.apiKey ?? process.env.GEMINI_API_KEY;
  const modelId = opts.model ?? process.env.GEMINI_MODEL ?? "gemini-2.5-flash";

  let model: ContentModel | undefined = opts.client;
  if (!model && apiKey) {
    model = new GoogleGenerativeAI(apiKey).getGenerativeModel({
      model: modelId,
      generationConfig: { temperature: opts.temperature ?? 0.2 },
    });
  }

  const maxRetries = Math.max(0, opts.maxRetries ?? 2);
  const timeoutMs = Math.max(1000, opts.timeoutMs ?? 15000);
  const baseDelayMs = Math.max(0, opts.retryBaseDelayMs ?? 200);

  return {
    async suggest(message: string, language: string): Promise<Suggestion> {
      const fallback = fallbackFor(language);
      // no key: answer without calling out
      if (!model) return fallback.disabled;
      const client = model;

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const text = await withRetries(maxRetries, baseDelayMs, async () => {
          const res = await client.generateContent(buildPrompt(message, language), { signal: controller.signal });
          return res.response.text().trim();
        });
        return parseAnswer(text, fallback);
      } catch (err) {
        return fallback.failure(err instanceof Error ? err.message : String(err));
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

/* ---------------- helpers ---------------- */

export function buildPrompt(message: string, language: string): string {
  if (language.toLowerCase().startsWith("fr")) {
    return `
Tu es un expert WebLogic. Résume ce message de log pour qu'il soit clair et concis, en expliquant l'erreur comme un expert, puis propose une solution courte et actionnable.
Message de log: ${message}
Réponds uniquement en JSON avec les champs:
{
  "reformulated": "phrase courte explicative",
  "solution": "solution concise"
}
`;
  }

  const answerIn = language.toLowerCase().startsWith("en") ? "" : `\nWrite both fields in this language: ${language}.`;
  return `
You are a WebLogic expert. Restate this log message so that it is clear and concise, explaining the error as an expert would, then propose a short, actionable fix.
Log message: ${message}
Answer ONLY with JSON using these fields:
{
  "reformulated": "short explanatory sentence",
  "solution": "concise fix"
}${answerIn}
`;
}

export function parseAnswer(raw: string, fallback: FallbackTexts): Suggestion {
  const block = raw.match(/\{[\s\S]*\}/);
  if (!block) return fallback.empty;

  // Strip trailing commas which occasionally appear
  const cleaned = block[0].replace(/,\s*}/g, "}").replace(/,\s*]/g, "]");
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch {
    return fallback.failure("malformed JSON answer");
  }

  const answer = answerSchema.safeParse(parsed);
  if (!answer.success) return fallback.failure("answer is missing reformulated/solution");
  return { reformulated: answer.data.reformulated.trim(), solution: answer.data.solution.trim() };
}

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 0;
}

export function isRetriable(err: unknown): boolean {
  const status = errorStatus(err);
  const msg = err instanceof Error ? err.message : String(err);
  return status === 429 || status >= 500 || /fetch|timeout|ECONNRESET|ETIMEDOUT/i.test(msg);
}

async function withRetries<T>(retries: number, baseDelayMs: number, fn: () => Promise<T>): Promise<T> {
  const backoff = (n: number) => new Promise((r) => setTimeout(r, baseDelayMs * Math.pow(2, n)));
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt < retries && isRetriable(err)) {
        await backoff(attempt);
        continue;
      }
      // Helpful hint if model id is wrong (404)
      if (errorStatus(err) === 404) {
        throw new Error(`Gemini model not found: check GEMINI_MODEL (${err instanceof Error ? err.message : String(err)})`);
      }
      throw err;
    }
  }
}
