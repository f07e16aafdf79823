import { PassThrough } from "node:stream";
import winston from "winston";
import { describe, expect, it } from "vitest";
import { createLogger } from "../src/index.js";

function capture(level?: string) {
  const stream = new PassThrough();
  const lines: string[] = [];
  stream.on("data", (chunk: Buffer) => lines.push(...chunk.toString().split("\n").filter(Boolean)));
  const logger = createLogger({ level, service: "test-svc", transports: [new winston.transports.Stream({ stream })] });
  return { logger, lines };
}

// winston hands entries to transports through piped streams
const flush = () => new Promise((resolve) => setTimeout(resolve, 20));

describe("createLogger", () => {
  it("writes json lines with the service name and metadata", async () => {
    const { logger, lines } = capture();
    logger.info("log file grouped", { filename: "a.log", groups: 2 });
    await flush();

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? "{}");
    expect(entry).toMatchObject({
      level: "info",
      message: "log file grouped",
      service: "test-svc",
      filename: "a.log",
      groups: 2,
    });
    expect(typeof entry.timestamp).toBe("string");
  });

  it("drops entries below the configured level", async () => {
    const { logger, lines } = capture("warn");
    logger.info("hidden");
    logger.debug("hidden too");
    logger.warn("shown");
    await flush();

    expect(lines.map((l) => JSON.parse(l).message)).toEqual(["shown"]);
  });

  it("keeps the stack of logged errors", async () => {
    const { logger, lines } = capture();
    logger.error(new Error("render failed"));
    await flush();

    const entry = JSON.parse(lines[0] ?? "{}");
    expect(entry.message).toBe("render failed");
    expect(entry.stack).toContain("Error: render failed");
  });
});
