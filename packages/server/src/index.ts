export { createApp, type AppDeps } from "./app.js";
export { configSchema, hasGemini, loadConfig, parseConfig, type Config } from "./config/index.js";
export { createLogRouter, type LogRouterDeps } from "./routes/logs.js";
export { errorHandler, toHttpError, type HttpError } from "./middleware/errors.js";
export { buildLogReport, readReportForm, toLogFiles, type ReportForm, type UploadedLog } from "./services/reportService.js";
