import cors from "cors";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import type { Backends } from "./backends";
import { AppError, errorMessage } from "./errors";
import type { AppErrorCode } from "./errors";
import type { Logger } from "./logger";
import type { TranscriptionMetrics } from "./metrics";
import { buildRoutes } from "./routes";
import { SubmissionService } from "./submission.service";

export interface AppDeps {
  backends: Backends;
  uploadsDir: string;
  maxUploadBytes: number;
  metrics: TranscriptionMetrics;
  modelName: string;
  logger: Logger;
}

const STATUS_BY_CODE: Record<AppErrorCode, number> = {
  INVALID_PARAMS: 400,
  JOB_NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  RESOURCE_NOT_FOUND: 500,
  PROCESSING_ERROR: 500,
  INFRASTRUCTURE_ERROR: 503
};

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const { backends, logger } = deps;

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.status(200).json({ ok: true, backend: backends.kind, model: deps.modelName });
  });

  app.get("/api/metrics", (_req, res, next) => {
    const { registry } = deps.metrics;
    registry
      .metrics()
      .then((body) => {
        res.set("Content-Type", registry.contentType);
        res.send(body);
      })
      .catch(next);
  });

  app.use(
    "/api",
    buildRoutes({
      uploadsDir: deps.uploadsDir,
      maxUploadBytes: deps.maxUploadBytes,
      submission: new SubmissionService(backends.store, backends.queue, logger.child("submission")),
      store: backends.store,
      queue: backends.queue,
      notifier: backends.notifier,
      logger: logger.child("http")
    })
  );

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof multer.MulterError) {
      res.status(error.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({ error: error.message });
      return;
    }

    const status = error instanceof AppError ? STATUS_BY_CODE[error.code] : 500;
    if (status >= 500) {
      logger.error(`Erro na requisicao: ${errorMessage(error)}`);
    }
    res.status(status).json({ error: errorMessage(error, "Erro interno.") });
  });

  return app;
}
