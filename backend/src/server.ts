import dotenv from "dotenv";
import { LocalAudioStorage } from "./audio-storage";
import { createApp } from "./app";
import { createBackends } from "./backends";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";
import { startMaintenance } from "./maintenance";
import { createMetrics } from "./metrics";
import { TranscriptionWorker } from "./transcription.worker";
import { WhisperService, modelNameOf } from "./whisper.service";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger("api", config.logLevel);

  const storage = new LocalAudioStorage(config.uploadsDir, logger.child("storage"));
  await storage.ensureDirectory();

  const backends = await createBackends(config, logger);
  const shutdown = new AbortController();
  const metrics = createMetrics({ queue: backends.queue, defaultMetrics: true });

  // Fila em memoria nao e compartilhada entre processos: os workers rodam aqui mesmo.
  const workers: Array<Promise<void>> = [];
  if (backends.kind === "memory") {
    const engine = new WhisperService(config.whisper, logger.child("whisper"));
    for (let index = 0; index < config.worker.concurrency; index++) {
      const worker = new TranscriptionWorker({
        store: backends.store,
        queue: backends.queue,
        engine,
        storage,
        logger: logger.child(`worker-${index + 1}`),
        metrics,
        pollTimeoutMs: config.worker.pollTimeoutMs,
        errorBackoffMs: config.worker.errorBackoffMs
      });
      workers.push(worker.run(shutdown.signal));
    }
  }

  const stopMaintenance = startMaintenance({
    store: backends.store,
    queue: backends.queue,
    storage,
    logger: logger.child("maintenance"),
    retentionDays: config.retention.days,
    sweepIntervalMs: config.retention.sweepIntervalMs,
    reconcileGraceMs: config.reconcile.graceMs,
    reconcileIntervalMs: config.reconcile.intervalMs
  });

  const app = createApp({
    backends,
    uploadsDir: config.uploadsDir,
    maxUploadBytes: config.maxUploadBytes,
    metrics,
    modelName: modelNameOf(config.whisper.modelPath),
    logger
  });

  const server = app.listen(config.port, () => {
    logger.info(`Backend online na porta ${config.port} (fila: ${backends.kind})`);
  });

  const stop = async (signal: NodeJS.Signals) => {
    if (shutdown.signal.aborted) return;
    logger.info(`Sinal ${signal} recebido, encerrando...`);
    shutdown.abort();
    stopMaintenance();
    server.close();
    await Promise.all(workers);
    await backends.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      stop(signal).catch((error: unknown) => {
        logger.error(`Falha ao encerrar: ${errorMessage(error)}`);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error(`Falha ao iniciar o backend: ${errorMessage(error)}`);
  process.exit(1);
});
