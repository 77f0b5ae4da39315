import type Redis from "ioredis";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { AppError, InfrastructureError, JobNotFoundError, errorMessage } from "./errors";
import type { Job, JobPatch } from "./job";
import { JOB_STATUSES, applyJobPatch, completedAtOf, createQueuedJob, startedAtOf } from "./job";
import type { JobStore, JobStoreOptions, ListJobsOptions } from "./job-store";
import { DAY_MS, DEFAULT_RETENTION_DAYS, isSweepable, sortByCreatedAtDesc } from "./job-store";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { StatusNotifier } from "./notifier";
import { createStatusEvent } from "./notifier";
import type { TranscriptionParams } from "./transcription";
import { transcriptionParamsSchema, transcriptionResultSchema } from "./transcription";

const JOB_KEY_PREFIX = "job:";
const JOB_KEY_PATTERN = /^job:[^:]+$/;

export function jobKey(id: string): string {
  return `${JOB_KEY_PREFIX}${id}`;
}

const jsonText = z.string().transform((raw, ctx) => {
  try {
    const value: unknown = JSON.parse(raw);
    return value;
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "JSON invalido" });
    return z.NEVER;
  }
});

const isoDate = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

// Layout do hash job:{id}. params e result vao como JSON, datas em ISO.
const jobHashSchema = z.object({
  id: z.string().min(1),
  status: z.enum(JOB_STATUSES),
  audioRef: z.string(),
  params: jsonText.pipe(transcriptionParamsSchema),
  progress: z.coerce.number().int().min(0).max(100),
  createdAt: isoDate,
  startedAt: isoDate.optional(),
  completedAt: isoDate.optional(),
  result: jsonText.pipe(transcriptionResultSchema).optional(),
  error: z.string().optional()
});

export function deserializeJob(hash: Record<string, string>): Job {
  const parsed = jobHashSchema.safeParse(hash);
  if (!parsed.success) {
    throw new InfrastructureError(`Registro de job corrompido: ${parsed.error.issues[0]?.message ?? "formato invalido"}`);
  }

  const { status, startedAt, completedAt, result, error, ...rest } = parsed.data;
  const base = { ...rest, params: Object.freeze(rest.params) };
  const missing = (field: string): never => {
    throw new InfrastructureError(`Registro de job ${rest.id} sem ${field} em ${status}`);
  };

  switch (status) {
    case "queued":
      return { ...base, status };
    case "processing":
      return { ...base, status, startedAt: startedAt ?? missing("startedAt") };
    case "completed":
      return {
        ...base,
        status,
        startedAt: startedAt ?? missing("startedAt"),
        completedAt: completedAt ?? missing("completedAt"),
        result: result ?? missing("result")
      };
    case "failed":
      return {
        ...base,
        status,
        startedAt: startedAt ?? missing("startedAt"),
        completedAt: completedAt ?? missing("completedAt"),
        error: error ?? missing("error")
      };
  }
}

export function serializeJob(job: Job): Record<string, string> {
  const hash: Record<string, string> = {
    id: job.id,
    status: job.status,
    audioRef: job.audioRef,
    params: JSON.stringify(job.params),
    progress: String(job.progress),
    createdAt: job.createdAt.toISOString()
  };
  const startedAt = startedAtOf(job);
  if (startedAt) hash.startedAt = startedAt.toISOString();
  const completedAt = completedAtOf(job);
  if (completedAt) hash.completedAt = completedAt.toISOString();
  if (job.status === "completed") hash.result = JSON.stringify(job.result);
  if (job.status === "failed") hash.error = job.error;
  return hash;
}

export class RedisJobStore implements JobStore {
  private readonly notifier: StatusNotifier;
  private readonly ttlSeconds: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly logger: Logger;

  constructor(private readonly redis: Redis, options: JobStoreOptions) {
    this.notifier = options.notifier;
    this.ttlSeconds = Math.round(((options.ttlDays ?? DEFAULT_RETENTION_DAYS) * DAY_MS) / 1000);
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? uuidv4;
    this.logger = options.logger ?? silentLogger;
  }

  async create(audioRef: string, params: TranscriptionParams): Promise<string> {
    const id = this.generateId();
    const job = createQueuedJob(id, audioRef, params, this.now());

    await this.call("criar job", () =>
      this.redis.multi().hset(jobKey(id), serializeJob(job)).expire(jobKey(id), this.ttlSeconds).exec()
    );

    this.logger.info(`Job ${id} criado`);
    return id;
  }

  async get(id: string): Promise<Job | undefined> {
    const hash = await this.call("ler job", () => this.redis.hgetall(jobKey(id)));
    if (Object.keys(hash).length === 0) return undefined;
    return deserializeJob(hash);
  }

  async update(id: string, patch: JobPatch): Promise<Job> {
    const current = await this.get(id);
    if (!current) {
      throw new JobNotFoundError(id);
    }

    const next = applyJobPatch(current, patch);
    const serialized = serializeJob(next);
    // So os campos tocados pelo patch sao gravados (merge por campo).
    const fields: Record<string, string> = { status: serialized.status, progress: serialized.progress };
    for (const field of Object.keys(patch)) {
      const value = serialized[field];
      if (value !== undefined) fields[field] = value;
    }

    await this.call("atualizar job", () =>
      this.redis.multi().hset(jobKey(id), fields).expire(jobKey(id), this.ttlSeconds).exec()
    );
    this.logger.info(`Job ${id} atualizado para ${next.status} (${next.progress}%)`);

    await this.notifier.publish(createStatusEvent(id, next.status, next.progress, this.now()));
    return next;
  }

  async list(options: ListJobsOptions = {}): Promise<Job[]> {
    const limit = options.limit ?? 100;
    const jobs: Job[] = [];
    for (const key of await this.scanJobKeys()) {
      const job = await this.readForScan(key);
      if (job && (options.status === undefined || job.status === options.status)) {
        jobs.push(job);
      }
    }
    return sortByCreatedAtDesc(jobs).slice(0, limit);
  }

  async sweepExpired(olderThanDays: number = DEFAULT_RETENTION_DAYS): Promise<number> {
    const cutoff = new Date(this.now().getTime() - olderThanDays * DAY_MS);
    let deleted = 0;
    for (const key of await this.scanJobKeys()) {
      const job = await this.readForScan(key);
      if (job && isSweepable(job, cutoff)) {
        deleted += await this.call("remover job", () => this.redis.del(key));
      }
    }
    this.logger.info(`Limpeza removeu ${deleted} jobs antigos`);
    return deleted;
  }

  private async scanJobKeys(): Promise<string[]> {
    return this.call("listar jobs", async () => {
      const keys = new Set<string>();
      const stream = this.redis.scanStream({ match: `${JOB_KEY_PREFIX}*`, count: 1000 });
      for await (const batch of stream) {
        for (const key of z.array(z.string()).parse(batch)) {
          if (JOB_KEY_PATTERN.test(key)) keys.add(key);
        }
      }
      return [...keys];
    });
  }

  // Registro corrompido nao derruba uma varredura inteira.
  private async readForScan(key: string): Promise<Job | undefined> {
    try {
      return await this.get(key.slice(JOB_KEY_PREFIX.length));
    } catch (error) {
      this.logger.warn(`Ignorando ${key}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new InfrastructureError(`Falha no Redis ao ${operation}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
