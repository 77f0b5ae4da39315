import type { LocalAudioStorage } from "./audio-storage";
import { errorMessage } from "./errors";
import { DAY_MS } from "./job-store";
import type { JobStore } from "./job-store";
import type { Logger } from "./logger";
import type { WorkQueue } from "./queue";
import { reconcileOrphanedJobs } from "./reconcile";

export interface MaintenanceOptions {
  store: JobStore;
  queue: WorkQueue;
  storage?: LocalAudioStorage;
  logger: Logger;
  retentionDays: number;
  sweepIntervalMs: number;
  reconcileGraceMs: number;
  reconcileIntervalMs: number;
}

function every(intervalMs: number, task: () => Promise<void>): NodeJS.Timeout {
  const timer = setInterval(() => {
    void task();
  }, intervalMs);
  timer.unref();
  return timer;
}

/** Agenda limpeza de retencao, reconciliacao e limpeza de uploads. Retorna stop(). */
export function startMaintenance(options: MaintenanceOptions): () => void {
  const { logger } = options;

  const sweep = async () => {
    try {
      const deleted = await options.store.sweepExpired(options.retentionDays);
      if (options.storage) {
        const removed = await options.storage.removeOlderThan(options.retentionDays * DAY_MS);
        if (removed > 0) logger.info(`${removed} arquivos antigos removidos de ${options.storage.directory}`);
      }
      logger.debug(`Limpeza de retencao: ${deleted} jobs removidos`);
    } catch (error) {
      logger.error(`Falha na limpeza de retencao: ${errorMessage(error)}`);
    }
  };

  const reconcile = async () => {
    try {
      const requeued = await reconcileOrphanedJobs({
        store: options.store,
        queue: options.queue,
        graceMs: options.reconcileGraceMs,
        logger
      });
      if (requeued > 0) logger.info(`Reconciliacao reenfileirou ${requeued} jobs`);
    } catch (error) {
      logger.error(`Falha na reconciliacao: ${errorMessage(error)}`);
    }
  };

  const timers = [every(options.sweepIntervalMs, sweep), every(options.reconcileIntervalMs, reconcile)];

  return () => {
    for (const timer of timers) clearInterval(timer);
  };
}
