import os from "node:os";
import path from "node:path";
import type { LogLevel } from "./logger";
import { isLogLevel } from "./logger";

export type QueueBackend = "memory" | "redis";

export interface AppConfig {
  port: number;
  uploadsDir: string;
  maxUploadBytes: number;
  backend: QueueBackend;
  redis: {
    host: string;
    port: number;
    db: number;
    password?: string;
  };
  whisper: {
    whisperPath: string;
    modelPath: string;
    ffmpegPath: string;
    threads: number;
  };
  worker: {
    concurrency: number;
    pollTimeoutMs: number;
    errorBackoffMs: number;
    /** Porta do /metrics do worker separado; 0 desliga. */
    metricsPort: number;
  };
  retention: {
    days: number;
    sweepIntervalMs: number;
  };
  reconcile: {
    graceMs: number;
    intervalMs: number;
  };
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new Error(`Variavel ${name} invalida: "${raw}".`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const modelPath = env.WHISPER_MODEL;
  if (!modelPath) {
    throw new Error("Variavel WHISPER_MODEL nao configurada.");
  }

  const backend = env.QUEUE_BACKEND || "memory";
  if (backend !== "memory" && backend !== "redis") {
    throw new Error(`Variavel QUEUE_BACKEND invalida: "${backend}" (use memory ou redis).`);
  }

  const logLevel = env.LOG_LEVEL || "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`Variavel LOG_LEVEL invalida: "${logLevel}".`);
  }

  const config: AppConfig = {
    port: readNumber(env, "PORT", 3001),
    uploadsDir: path.resolve(env.UPLOADS_DIR || "uploads"),
    maxUploadBytes: readNumber(env, "MAX_UPLOAD_MB", 200, 1) * 1024 * 1024,
    backend,
    redis: {
      host: env.REDIS_HOST || "localhost",
      port: readNumber(env, "REDIS_PORT", 6379),
      db: readNumber(env, "REDIS_DB", 0),
      password: env.REDIS_PASSWORD || undefined
    },
    whisper: {
      whisperPath: env.WHISPER_PATH || "whisper-cli",
      modelPath,
      ffmpegPath: env.FFMPEG_PATH || "ffmpeg",
      threads: readNumber(env, "WHISPER_THREADS", Math.max(1, os.cpus().length), 1)
    },
    worker: {
      concurrency: readNumber(env, "WORKER_CONCURRENCY", 1, 1),
      pollTimeoutMs: readNumber(env, "WORKER_POLL_TIMEOUT_MS", 5000, 1),
      errorBackoffMs: readNumber(env, "WORKER_ERROR_BACKOFF_MS", 5000),
      metricsPort: readNumber(env, "WORKER_METRICS_PORT", 0)
    },
    retention: {
      days: readNumber(env, "JOB_RETENTION_DAYS", 7, 1),
      sweepIntervalMs: readNumber(env, "SWEEP_INTERVAL_MINUTES", 60, 1) * 60 * 1000
    },
    reconcile: {
      graceMs: readNumber(env, "RECONCILE_GRACE_SECONDS", 60) * 1000,
      intervalMs: readNumber(env, "RECONCILE_INTERVAL_SECONDS", 60, 1) * 1000
    },
    logLevel
  };

  return Object.freeze(config);
}
