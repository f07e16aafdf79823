import { Router } from "express";
import multer from "multer";
import type { Analyzer } from "@wlr/core";
import { buildLogReport } from "../services/reportService.js";

export interface LogRouterDeps {
  analyzer: Analyzer;
  maxUploadBytes: number;
}

export function createLogRouter({ analyzer, maxUploadBytes }: LogRouterDeps): Router {
  const router = Router();
  // uploads stay in memory: nothing to clean up on disk whatever the outcome
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: maxUploadBytes } });

  // POST /log/processLogFile
  router.post("/processLogFile", upload.array("files"), async (req, res, next) => {
    try {
      const uploads = Array.isArray(req.files) ? req.files : [];
      const pdf = await buildLogReport(analyzer, uploads, req.body);
      res.status(200).type("application/pdf").attachment("report.pdf").send(pdf);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
