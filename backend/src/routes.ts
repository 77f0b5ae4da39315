import fs from "node:fs";
import path from "node:path";
import { Router } from "express";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";
import { v4 as uuidv4 } from "uuid";
import { ParamsValidationError, errorMessage } from "./errors";
import { isJobStatus, isTerminalStatus, toJobView } from "./job";
import type { JobStore } from "./job-store";
import type { Logger } from "./logger";
import type { JobStatusEvent, StatusNotifier } from "./notifier";
import { createStatusEvent } from "./notifier";
import type { WorkQueue } from "./queue";
import type { SubmissionService } from "./submission.service";
import { SUPPORTED_LANGUAGES, parseFormParams } from "./transcription";
import type { TranscriptionParams } from "./transcription";

export interface RouteDeps {
  uploadsDir: string;
  maxUploadBytes: number;
  submission: SubmissionService;
  store: JobStore;
  queue: WorkQueue;
  notifier: StatusNotifier;
  logger: Logger;
}

const MAX_LIST_LIMIT = 1000;

export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function writeEvent(res: Response, event: JobStatusEvent): void {
  res.write(`event: status\ndata: ${JSON.stringify(event)}\n\n`);
}

export function buildRoutes(deps: RouteDeps): Router {
  const router = Router();

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => cb(null, deps.uploadsDir),
    filename: (_req, file, cb) => {
      const ext = path.extname(file.originalname) || ".wav";
      cb(null, `${uuidv4()}${ext}`);
    }
  });

  const upload = multer({
    storage,
    limits: { fileSize: deps.maxUploadBytes }
  });

  router.post(
    "/transcribe",
    upload.single("audio"),
    asyncHandler(async (req, res) => {
      if (!req.file) {
        res.status(400).json({ error: "Arquivo de audio e obrigatorio no campo 'audio'." });
        return;
      }

      const inputFile = req.file.path;
      let params: TranscriptionParams;
      try {
        params = parseFormParams(req.body, req.file.originalname);
      } catch (error) {
        fs.promises.unlink(inputFile).catch((unlinkError: unknown) => {
          deps.logger.warn(`Falha ao remover upload rejeitado ${inputFile}: ${errorMessage(unlinkError)}`);
        });
        throw error;
      }

      const id = await deps.submission.submit({ audioRef: inputFile, params });

      res.status(202).json({
        id,
        status: "queued",
        statusUrl: `/api/transcribe/${id}`,
        eventsUrl: `/api/transcribe/${id}/events`
      });
    })
  );

  router.get(
    "/transcribe/:id",
    asyncHandler(async (req, res) => {
      const job = await deps.store.get(req.params.id);
      if (!job) {
        res.status(404).json({ error: "Transcricao nao encontrada." });
        return;
      }

      res.status(200).json(toJobView(job));
    })
  );

  // Estado atual primeiro, depois eventos ao vivo ate um estado terminal.
  router.get(
    "/transcribe/:id/events",
    asyncHandler(async (req, res) => {
      const id = req.params.id;
      const subscription = await deps.notifier.subscribe(id);
      const job = await deps.store.get(id).catch(async (error: unknown) => {
        await subscription.close();
        throw error;
      });
      if (!job) {
        await subscription.close();
        res.status(404).json({ error: "Transcricao nao encontrada." });
        return;
      }

      res.writeHead(200, {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive"
      });
      writeEvent(res, createStatusEvent(job.id, job.status, job.progress));

      if (!isTerminalStatus(job.status)) {
        req.on("close", () => {
          void subscription.close();
        });
        for await (const event of subscription) {
          writeEvent(res, event);
          if (isTerminalStatus(event.status)) break;
        }
      }

      await subscription.close();
      res.end();
    })
  );

  router.get(
    "/jobs",
    asyncHandler(async (req, res) => {
      const { status, limit } = req.query;
      if (status !== undefined && !isJobStatus(status)) {
        throw new ParamsValidationError(`Status invalido: ${String(status)}`);
      }

      let parsedLimit = 100;
      if (limit !== undefined) {
        parsedLimit = Number(limit);
        if (!Number.isInteger(parsedLimit) || parsedLimit < 1 || parsedLimit > MAX_LIST_LIMIT) {
          throw new ParamsValidationError(`limit deve ser um inteiro entre 1 e ${MAX_LIST_LIMIT}.`);
        }
      }

      const jobs = await deps.store.list({ status, limit: parsedLimit });
      res.status(200).json({ jobs: jobs.map(toJobView) });
    })
  );

  router.get("/languages", (_req, res) => {
    res.status(200).json({ languages: SUPPORTED_LANGUAGES, count: SUPPORTED_LANGUAGES.length });
  });

  router.get(
    "/queue",
    asyncHandler(async (_req, res) => {
      res.status(200).json({ pending: await deps.queue.length() });
    })
  );

  return router;
}
