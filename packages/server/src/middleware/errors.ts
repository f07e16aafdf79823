import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AnalyzerError, InputValidationError, type LoggerPort } from "@wlr/core";

export interface HttpError {
  status: number;
  body: { error: string; details?: unknown; message?: string };
}

export function toHttpError(err: unknown, exposeMessage: boolean): HttpError {
  if (err instanceof InputValidationError) {
    return {
      status: 400,
      body: err.details.length ? { error: err.message, details: err.details } : { error: err.message },
    };
  }
  if (err instanceof multer.MulterError) {
    return { status: 400, body: { error: err.message } };
  }
  const message = err instanceof Error ? err.message : String(err);
  return {
    status: 500,
    body: { error: "Internal server error", message: exposeMessage ? message : undefined },
  };
}

export function errorHandler(logger: LoggerPort, exposeMessage: boolean) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toHttpError(err, exposeMessage);
    if (status >= 500) {
      logger.error("request failed", {
        method: req.method,
        path: req.path,
        code: err instanceof AnalyzerError ? err.code : undefined,
        error: err instanceof Error ? err.stack ?? err.message : String(err),
      });
    } else {
      logger.warn("request rejected", { method: req.method, path: req.path, error: body.error });
    }
    res.status(status).json(body);
  };
}
