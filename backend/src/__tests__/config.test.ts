import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../config";

const base = { WHISPER_MODEL: "/models/ggml-base.bin" };

describe("loadConfig", () => {
  it("exige WHISPER_MODEL", () => {
    expect(() => loadConfig({})).toThrow("Variavel WHISPER_MODEL nao configurada.");
  });

  it("usa os valores padrao", () => {
    const config = loadConfig(base);

    expect(config.port).toBe(3001);
    expect(config.backend).toBe("memory");
    expect(config.uploadsDir).toBe(path.resolve("uploads"));
    expect(config.maxUploadBytes).toBe(200 * 1024 * 1024);
    expect(config.redis).toEqual({ host: "localhost", port: 6379, db: 0, password: undefined });
    expect(config.worker).toEqual({ concurrency: 1, pollTimeoutMs: 5000, errorBackoffMs: 5000, metricsPort: 0 });
    expect(config.retention).toEqual({ days: 7, sweepIntervalMs: 60 * 60 * 1000 });
    expect(config.reconcile).toEqual({ graceMs: 60_000, intervalMs: 60_000 });
    expect(config.whisper.whisperPath).toBe("whisper-cli");
    expect(config.whisper.ffmpegPath).toBe("ffmpeg");
    expect(config.logLevel).toBe("info");
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("le as variaveis informadas", () => {
    const config = loadConfig({
      ...base,
      PORT: "8080",
      QUEUE_BACKEND: "redis",
      REDIS_HOST: "cache",
      REDIS_PASSWORD: "test-secret",
      WORKER_CONCURRENCY: "4",
      JOB_RETENTION_DAYS: "3",
      LOG_LEVEL: "debug"
    });

    expect(config.port).toBe(8080);
    expect(config.backend).toBe("redis");
    expect(config.redis).toMatchObject({ host: "cache", password: "test-secret" });
    expect(config.worker.concurrency).toBe(4);
    expect(config.retention.days).toBe(3);
    expect(config.logLevel).toBe("debug");
  });

  it("rejeita valores invalidos", () => {
    expect(() => loadConfig({ ...base, PORT: "abc" })).toThrow('Variavel PORT invalida: "abc".');
    expect(() => loadConfig({ ...base, WORKER_CONCURRENCY: "0" })).toThrow("WORKER_CONCURRENCY");
    expect(() => loadConfig({ ...base, QUEUE_BACKEND: "kafka" })).toThrow("QUEUE_BACKEND");
    expect(() => loadConfig({ ...base, LOG_LEVEL: "verbose" })).toThrow("LOG_LEVEL");
  });
});
