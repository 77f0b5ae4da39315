import { InvalidJobTransitionError } from "./errors";
import type { TranscriptionParams, TranscriptionResult } from "./transcription";

export const JOB_STATUSES = ["queued", "processing", "completed", "failed"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];
export type TerminalJobStatus = "completed" | "failed";

/**
 * Unicas arestas permitidas. completed e failed sao terminais.
 */
export const JOB_TRANSITIONS = {
  queued: ["processing"],
  processing: ["completed", "failed"],
  completed: [],
  failed: []
} as const satisfies { readonly [S in JobStatus]: readonly JobStatus[] };

export type NextJobStatus<S extends JobStatus> = (typeof JOB_TRANSITIONS)[S][number];

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === "string" && (JOB_STATUSES as readonly string[]).includes(value);
}

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
  return status === "completed" || status === "failed";
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  const allowed: readonly JobStatus[] = JOB_TRANSITIONS[from];
  return allowed.includes(to);
}

interface JobBase {
  id: string;
  audioRef: string;
  params: TranscriptionParams;
  progress: number;
  createdAt: Date;
}

export interface QueuedJob extends JobBase {
  status: "queued";
}

export interface ProcessingJob extends JobBase {
  status: "processing";
  startedAt: Date;
}

export interface CompletedJob extends JobBase {
  status: "completed";
  startedAt: Date;
  completedAt: Date;
  result: TranscriptionResult;
}

export interface FailedJob extends JobBase {
  status: "failed";
  startedAt: Date;
  completedAt: Date;
  error: string;
}

export type Job = QueuedJob | ProcessingJob | CompletedJob | FailedJob;

/** Campos que podem ser atualizados de forma independente. */
export interface JobPatch {
  status?: JobStatus;
  progress?: number;
  result?: TranscriptionResult;
  error?: string;
  startedAt?: Date;
  completedAt?: Date;
}

export function startedAtOf(job: Job): Date | undefined {
  return job.status === "queued" ? undefined : job.startedAt;
}

export function completedAtOf(job: Job): Date | undefined {
  return job.status === "completed" || job.status === "failed" ? job.completedAt : undefined;
}

export function markProcessing(now: Date): JobPatch {
  return { status: "processing", progress: 10, startedAt: now };
}

export function markCompleted(result: TranscriptionResult, now: Date): JobPatch {
  return { status: "completed", progress: 100, result, completedAt: now };
}

export function markFailed(error: string, now: Date): JobPatch {
  return { status: "failed", error, completedAt: now };
}

export function createQueuedJob(id: string, audioRef: string, params: TranscriptionParams, now: Date): QueuedJob {
  return { id, status: "queued", audioRef, params, progress: 0, createdAt: now };
}

/**
 * Mescla um patch parcial no registro e devolve o novo estado.
 * Campos ausentes no patch ficam como estavam; qualquer combinacao que viole
 * a maquina de estados lanca InvalidJobTransitionError sem alterar nada.
 */
export function applyJobPatch(job: Job, patch: JobPatch): Job {
  const fail = (reason: string): never => {
    throw new InvalidJobTransitionError(job.id, reason);
  };

  const status = patch.status ?? job.status;
  if (status !== job.status && !canTransition(job.status, status)) {
    fail(`transicao ${job.status} -> ${status} nao permitida`);
  }

  const progress = patch.progress ?? job.progress;
  if (!Number.isInteger(progress) || progress < 0 || progress > 100) {
    fail(`progresso ${progress} fora do intervalo 0-100`);
  }
  if (progress < job.progress) {
    fail(`progresso nao pode regredir (${job.progress} -> ${progress})`);
  }

  const previousStartedAt = startedAtOf(job);
  if (patch.startedAt !== undefined && previousStartedAt !== undefined) {
    fail("startedAt ja foi definido");
  }
  const previousCompletedAt = completedAtOf(job);
  if (patch.completedAt !== undefined && previousCompletedAt !== undefined) {
    fail("completedAt ja foi definido");
  }
  if (patch.result !== undefined && status !== "completed") {
    fail(`result so pode ser definido em completed (status ${status})`);
  }
  if (patch.error !== undefined && status !== "failed") {
    fail(`error so pode ser definido em failed (status ${status})`);
  }

  const base: JobBase = {
    id: job.id,
    audioRef: job.audioRef,
    params: job.params,
    progress,
    createdAt: job.createdAt
  };

  if (status === "queued") {
    if (patch.startedAt !== undefined || patch.completedAt !== undefined) {
      fail("job na fila nao pode ter startedAt/completedAt");
    }
    return { ...base, status };
  }

  const startedAt = previousStartedAt ?? patch.startedAt ?? fail(`startedAt obrigatorio em ${status}`);

  if (status === "processing") {
    if (patch.completedAt !== undefined) fail("completedAt so pode ser definido em estado terminal");
    return { ...base, status, startedAt };
  }

  const completedAt = previousCompletedAt ?? patch.completedAt ?? fail(`completedAt obrigatorio em ${status}`);

  if (status === "completed") {
    const result = patch.result ?? (job.status === "completed" ? job.result : undefined) ?? fail("result obrigatorio em completed");
    return { ...base, status, startedAt, completedAt, result };
  }

  const error = patch.error ?? (job.status === "failed" ? job.error : undefined) ?? fail("error obrigatorio em failed");
  return { ...base, status, startedAt, completedAt, error };
}

/** Representacao JSON devolvida pela API. */
export interface JobView {
  id: string;
  status: JobStatus;
  progress: number;
  params: TranscriptionParams;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  result?: TranscriptionResult;
  error?: string;
}

export function toJobView(job: Job): JobView {
  const view: JobView = {
    id: job.id,
    status: job.status,
    progress: job.progress,
    params: job.params,
    createdAt: job.createdAt.toISOString()
  };
  const startedAt = startedAtOf(job);
  if (startedAt) view.startedAt = startedAt.toISOString();
  const completedAt = completedAtOf(job);
  if (completedAt) view.completedAt = completedAt.toISOString();
  if (job.status === "completed") view.result = job.result;
  if (job.status === "failed") view.error = job.error;
  return view;
}
