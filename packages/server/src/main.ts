import { createAnalyzer } from "@wlr/core";
import { makeGeminiSuggester } from "@wlr/adapter-gemini";
import { makePdfRenderer } from "@wlr/adapter-pdf";
import { createLogger } from "@wlr/logger";
import { createApp } from "./app.js";
import { hasGemini, loadConfig } from "./config/index.js";

const config = loadConfig();
const logger = createLogger({
  level: config.logLevel,
  service: "wlr-server",
  pretty: config.nodeEnv === "development",
});

const analyzer = createAnalyzer({
  suggester: makeGeminiSuggester({ apiKey: config.geminiApiKey, model: config.geminiModel }),
  renderer: makePdfRenderer({ bandTitle: config.reportTitle }),
  logger,
  enrichConcurrency: config.enrichConcurrency,
});

const app = createApp({
  analyzer,
  logger,
  maxUploadBytes: Math.round(config.maxUploadMb * 1024 * 1024),
  exposeErrors: config.nodeEnv === "development",
});

const server = app.listen(config.port, () => {
  logger.info("server listening", {
    port: config.port,
    env: config.nodeEnv,
    gemini: hasGemini(config) ? "configured" : "not configured",
    model: config.geminiModel,
  });
});

// Handle graceful shutdown
function shutdown(signal: string) {
  logger.info("shutting down", { signal });
  server.close((err) => {
    if (err) logger.error("shutdown failed", { error: err.message });
    process.exit(err ? 1 : 0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
