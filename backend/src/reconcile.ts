import type { JobStore } from "./job-store";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { WorkQueue } from "./queue";

export interface ReconcileOptions {
  store: JobStore;
  queue: WorkQueue;
  graceMs: number;
  now?: () => Date;
  logger?: Logger;
  scanLimit?: number;
}

/**
 * Reenfileira registros em queued que nao estao na fila ha mais de graceMs
 * (queda entre o create e o enqueue). Uma entrega repetida e descartada
 * pelo worker, que so reivindica jobs ainda em queued.
 */
export async function reconcileOrphanedJobs(options: ReconcileOptions): Promise<number> {
  const now = (options.now ?? (() => new Date()))();
  const logger = options.logger ?? silentLogger;

  const queued = await options.store.list({ status: "queued", limit: options.scanLimit ?? 10_000 });
  if (queued.length === 0) return 0;

  const pending = new Set(await options.queue.pending());
  let requeued = 0;
  for (const job of queued) {
    if (pending.has(job.id)) continue;
    if (now.getTime() - job.createdAt.getTime() < options.graceMs) continue;
    await options.queue.enqueue(job.id);
    logger.warn(`Job ${job.id} estava fora da fila, reenfileirado`);
    requeued++;
  }
  return requeued;
}
