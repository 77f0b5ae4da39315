import { v4 as uuidv4 } from "uuid";
import { JobNotFoundError } from "./errors";
import type { Job, JobPatch, JobStatus } from "./job";
import { applyJobPatch, completedAtOf, createQueuedJob, isTerminalStatus } from "./job";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { StatusNotifier } from "./notifier";
import { createStatusEvent } from "./notifier";
import type { TranscriptionParams } from "./transcription";

export const DEFAULT_RETENTION_DAYS = 7;
export const DAY_MS = 24 * 60 * 60 * 1000;

export interface ListJobsOptions {
  status?: JobStatus;
  limit?: number;
}

/**
 * Registro duravel de jobs. Cada update emite um evento no notifier.
 */
export interface JobStore {
  create(audioRef: string, params: TranscriptionParams): Promise<string>;
  get(id: string): Promise<Job | undefined>;
  /** Lanca JobNotFoundError para id desconhecido e InvalidJobTransitionError para patch invalido. */
  update(id: string, patch: JobPatch): Promise<Job>;
  /** Varredura O(n), ordenada por createdAt desc. Nao usar em caminho quente. */
  list(options?: ListJobsOptions): Promise<Job[]>;
  sweepExpired(olderThanDays: number): Promise<number>;
}

export interface JobStoreOptions {
  notifier: StatusNotifier;
  ttlDays?: number;
  now?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

export function sortByCreatedAtDesc(jobs: Job[]): Job[] {
  return jobs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}

export function isSweepable(job: Job, cutoff: Date): boolean {
  if (!isTerminalStatus(job.status)) return false;
  const completedAt = completedAtOf(job);
  return completedAt !== undefined && completedAt.getTime() < cutoff.getTime();
}

// Quem le recebe copias; o registro so muda via update().
interface StoredJob {
  job: Job;
  expiresAt: number;
}

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, StoredJob>();
  private readonly notifier: StatusNotifier;
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly logger: Logger;

  constructor(options: JobStoreOptions) {
    this.notifier = options.notifier;
    this.ttlMs = (options.ttlDays ?? DEFAULT_RETENTION_DAYS) * DAY_MS;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? uuidv4;
    this.logger = options.logger ?? silentLogger;
  }

  async create(audioRef: string, params: TranscriptionParams): Promise<string> {
    const now = this.now();
    const id = this.generateId();
    this.jobs.set(id, {
      job: createQueuedJob(id, audioRef, params, now),
      expiresAt: now.getTime() + this.ttlMs
    });
    this.logger.info(`Job ${id} criado`);
    return id;
  }

  async get(id: string): Promise<Job | undefined> {
    const stored = this.live(id);
    return stored ? structuredClone(stored.job) : undefined;
  }

  async update(id: string, patch: JobPatch): Promise<Job> {
    const stored = this.live(id);
    if (!stored) {
      throw new JobNotFoundError(id);
    }

    const next = applyJobPatch(stored.job, patch);
    this.jobs.set(id, { job: next, expiresAt: this.now().getTime() + this.ttlMs });
    this.logger.info(`Job ${id} atualizado para ${next.status} (${next.progress}%)`);

    await this.notifier.publish(createStatusEvent(id, next.status, next.progress, this.now()));
    return structuredClone(next);
  }

  async list(options: ListJobsOptions = {}): Promise<Job[]> {
    const limit = options.limit ?? 100;
    const jobs: Job[] = [];
    for (const id of [...this.jobs.keys()]) {
      const stored = this.live(id);
      if (stored && (options.status === undefined || stored.job.status === options.status)) {
        jobs.push(structuredClone(stored.job));
      }
    }
    return sortByCreatedAtDesc(jobs).slice(0, limit);
  }

  async sweepExpired(olderThanDays: number = DEFAULT_RETENTION_DAYS): Promise<number> {
    const cutoff = new Date(this.now().getTime() - olderThanDays * DAY_MS);
    let deleted = 0;
    for (const [id, stored] of this.jobs) {
      if (isSweepable(stored.job, cutoff)) {
        this.jobs.delete(id);
        deleted++;
      }
    }
    this.logger.info(`Limpeza removeu ${deleted} jobs antigos`);
    return deleted;
  }

  // Expiracao preguicosa, equivalente ao TTL do registro.
  private live(id: string): StoredJob | undefined {
    const stored = this.jobs.get(id);
    if (!stored) return undefined;
    if (stored.expiresAt <= this.now().getTime()) {
      this.jobs.delete(id);
      return undefined;
    }
    return stored;
  }
}
