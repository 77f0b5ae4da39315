import type { Server } from "node:http";
import dotenv from "dotenv";
import express from "express";
import { LocalAudioStorage } from "./audio-storage";
import { createRedisBackends } from "./backends";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { createMetrics } from "./metrics";
import type { TranscriptionMetrics } from "./metrics";
import { TranscriptionWorker } from "./transcription.worker";
import { WhisperService } from "./whisper.service";

dotenv.config();

// O processo do worker nao tem API; as metricas dele saem por uma porta propria.
function serveMetrics(metrics: TranscriptionMetrics, port: number, logger: Logger): Server {
  const app = express();
  app.get("/metrics", (_req, res, next) => {
    metrics.registry
      .metrics()
      .then((body) => {
        res.set("Content-Type", metrics.registry.contentType);
        res.send(body);
      })
      .catch(next);
  });
  return app.listen(port, () => logger.info(`Metricas do worker na porta ${port}`));
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger("worker", config.logLevel);

  if (config.backend !== "redis") {
    throw new Error("O worker separado precisa de QUEUE_BACKEND=redis.");
  }

  const backends = await createRedisBackends(config, logger);
  const engine = new WhisperService(config.whisper, logger.child("whisper"));
  const storage = new LocalAudioStorage(config.uploadsDir, logger.child("storage"));
  const shutdown = new AbortController();
  const metrics = createMetrics({ queue: backends.queue, defaultMetrics: true });
  const metricsServer = config.worker.metricsPort > 0 ? serveMetrics(metrics, config.worker.metricsPort, logger) : undefined;

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info(`Sinal ${signal} recebido, finalizando apos o job atual...`);
      shutdown.abort();
    });
  }

  const loops = Array.from({ length: config.worker.concurrency }, (_, index) =>
    new TranscriptionWorker({
      store: backends.store,
      queue: backends.queue,
      engine,
      storage,
      logger: logger.child(`loop-${index + 1}`),
      metrics,
      pollTimeoutMs: config.worker.pollTimeoutMs,
      errorBackoffMs: config.worker.errorBackoffMs
    }).run(shutdown.signal)
  );

  await Promise.all(loops);
  metricsServer?.close();
  await backends.close();
}

main().catch((error: unknown) => {
  console.error(`Falha no worker: ${errorMessage(error)}`);
  process.exit(1);
});
