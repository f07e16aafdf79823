import { z } from "zod";
import dotenv from "dotenv";

// Configuration schema with validation
export const configSchema = z.object({
  // Server
  port: z.coerce.number().int().positive().default(3001),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),

  // Gemini (suggestions fall back to a fixed text when the key is missing)
  geminiApiKey: z.string().min(1).optional(),
  geminiModel: z.string().min(1).default("gemini-2.5-flash"),
  enrichConcurrency: z.coerce.number().int().min(1).max(16).default(1),

  // Uploads and report
  maxUploadMb: z.coerce.number().positive().default(20),
  reportTitle: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

// Blank variables count as unset, as in an .env file with `KEY=`
const blankToUndefined = (v: string | undefined) => (v === undefined || v.trim() === "" ? undefined : v);

export function parseConfig(env: Env) {
  return configSchema.safeParse({
    port: blankToUndefined(env.PORT),
    nodeEnv: blankToUndefined(env.NODE_ENV),
    logLevel: blankToUndefined(env.LOG_LEVEL),
    geminiApiKey: blankToUndefined(env.GEMINI_API_KEY),
    geminiModel: blankToUndefined(env.GEMINI_MODEL),
    enrichConcurrency: blankToUndefined(env.ENRICH_CONCURRENCY),
    maxUploadMb: blankToUndefined(env.MAX_UPLOAD_MB),
    reportTitle: blankToUndefined(env.REPORT_TITLE),
  });
}

export function loadConfig(): Config {
  // Load environment variables
  dotenv.config();

  const result = parseConfig(process.env);
  if (!result.success) {
    console.error("❌ Configuration validation failed:");
    for (const issue of result.error.issues) {
      console.error(`   - ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export function hasGemini(config: Config): boolean {
  return !!config.geminiApiKey;
}
