import winston from "winston";

export interface LoggerOptions {
  level?: string; // default: "info"
  service?: string; // default: "weblogic-log-report"
  pretty?: boolean; // colorized single-line output for a terminal
  transports?: winston.transport[]; // default: console
}

const prettyFormat = winston.format.printf((info) => {
  const { timestamp, level, message, service, stack, ...meta } = info;
  const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
  const trace = typeof stack === "string" ? `\n${stack}` : "";
  return `${String(timestamp)} ${level} [${String(service)}] ${String(message)}${extra}${trace}`;
});

export function createLogger(opts: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: opts.level ?? "info",
    defaultMeta: { service: opts.service ?? "weblogic-log-report" },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      opts.pretty ? winston.format.combine(winston.format.colorize(), prettyFormat) : winston.format.json(),
    ),
    transports: opts.transports ?? [new winston.transports.Console()],
  });
}

export type { Logger } from "winston";
