import type { AudioStorage } from "./audio-storage";
import { InvalidJobTransitionError, ResourceNotFoundError, errorMessage } from "./errors";
import type { Job, JobPatch } from "./job";
import { markCompleted, markFailed, markProcessing } from "./job";
import type { JobStore } from "./job-store";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { TranscriptionMetrics } from "./metrics";
import type { WorkQueue } from "./queue";
import type { TranscriptionEngine } from "./transcription";

export interface TranscriptionWorkerDeps {
  store: JobStore;
  queue: WorkQueue;
  engine: TranscriptionEngine;
  storage: AudioStorage;
  logger?: Logger;
  metrics?: TranscriptionMetrics;
  pollTimeoutMs?: number;
  errorBackoffMs?: number;
  now?: () => Date;
}

/** Espera ms ou ate o sinal abortar, o que vier primeiro. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Consumidor da fila. Ciclo: ocioso -> job retirado -> processing ->
 * completed/failed -> ocioso. O sinal de parada so e verificado entre
 * iteracoes; um job ja retirado sempre vai ate o fim.
 */
export class TranscriptionWorker {
  private readonly store: JobStore;
  private readonly queue: WorkQueue;
  private readonly engine: TranscriptionEngine;
  private readonly storage: AudioStorage;
  private readonly logger: Logger;
  private readonly metrics?: TranscriptionMetrics;
  private readonly pollTimeoutMs: number;
  private readonly errorBackoffMs: number;
  private readonly now: () => Date;

  constructor(deps: TranscriptionWorkerDeps) {
    this.store = deps.store;
    this.queue = deps.queue;
    this.engine = deps.engine;
    this.storage = deps.storage;
    this.logger = deps.logger ?? silentLogger;
    this.metrics = deps.metrics;
    this.pollTimeoutMs = deps.pollTimeoutMs ?? 5000;
    this.errorBackoffMs = deps.errorBackoffMs ?? 5000;
    this.now = deps.now ?? (() => new Date());
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.info("Worker iniciado, aguardando jobs...");

    while (!signal.aborted) {
      try {
        const id = await this.queue.dequeue(this.pollTimeoutMs);
        if (id !== undefined) {
          await this.processJob(id);
        }
      } catch (error) {
        this.logger.error(`Erro no worker: ${errorMessage(error)}`);
        await delay(this.errorBackoffMs, signal);
      }
    }

    this.logger.info("Worker encerrado.");
  }

  /**
   * Processa um id ja retirado da fila. Retorna o estado terminal gravado,
   * ou undefined quando o id foi ignorado (registro sumiu ou ja foi reivindicado).
   * Erros de infraestrutura sobem para o loop.
   */
  async processJob(id: string): Promise<Job | undefined> {
    const job = await this.store.get(id);
    if (!job) {
      this.logger.warn(`Job ${id} retirado da fila mas nao existe no store, ignorando`);
      return undefined;
    }
    if (job.status !== "queued") {
      this.logger.warn(`Job ${id} ja esta em ${job.status}, entrega duplicada ignorada`);
      return undefined;
    }

    try {
      await this.store.update(id, markProcessing(this.now()));
    } catch (error) {
      if (error instanceof InvalidJobTransitionError) {
        this.logger.warn(`Job ${id} reivindicado por outro worker, ignorando`);
        return undefined;
      }
      throw error;
    }

    this.logger.info(`Processando job ${id}${job.params.originalFilename ? `: ${job.params.originalFilename}` : ""}`);

    try {
      return await this.execute(job);
    } finally {
      await this.cleanup(job.audioRef);
    }
  }

  // Falhas do audio ou da engine viram failed. Se a gravacao de completed falhar,
  // tenta gravar failed; se nem isso der certo o erro original sobe ao loop.
  private async execute(job: Job): Promise<Job> {
    const startTime = Date.now();
    let outcome: JobPatch;
    let sample: { duration: number; processingTime: number };
    try {
      if (!(await this.storage.exists(job.audioRef))) {
        throw new ResourceNotFoundError(job.audioRef);
      }

      const result = await this.engine.transcribe(job.audioRef, job.params);
      const processingTime = (Date.now() - startTime) / 1000;
      sample = { duration: result.duration, processingTime };
      outcome = markCompleted({ ...result, processingTime }, this.now());
      this.logger.info(
        `Job ${job.id} concluido | Duracao: ${result.duration.toFixed(2)}s | Processamento: ${processingTime.toFixed(2)}s`
      );
    } catch (error) {
      const message = errorMessage(error, "Erro desconhecido na transcricao.");
      this.logger.error(`Job ${job.id} falhou: ${message}`);
      return this.finishFailed(job.id, message);
    }

    try {
      const completed = await this.store.update(job.id, outcome);
      this.metrics?.recordCompleted(sample);
      return completed;
    } catch (error) {
      const message = `Falha ao gravar o resultado: ${errorMessage(error)}`;
      this.logger.error(`Job ${job.id}: ${message}`);
      try {
        return await this.finishFailed(job.id, message);
      } catch (fallbackError) {
        this.logger.error(`Job ${job.id} ficou sem estado final: ${errorMessage(fallbackError)}`);
        throw error;
      }
    }
  }

  private async finishFailed(id: string, message: string): Promise<Job> {
    const failed = await this.store.update(id, markFailed(message, this.now()));
    this.metrics?.recordFailed();
    return failed;
  }

  private async cleanup(audioRef: string): Promise<void> {
    try {
      await this.storage.remove(audioRef);
      this.logger.debug(`Arquivo temporario removido: ${audioRef}`);
    } catch (error) {
      this.logger.warn(`Falha ao remover o audio ${audioRef}: ${errorMessage(error)}`);
    }
  }
}
