import { describe, expect, it } from "vitest";
import { InfrastructureError } from "../errors";
import { applyJobPatch, createQueuedJob, markCompleted, markFailed, markProcessing } from "../job";
import { deserializeJob, jobKey, serializeJob } from "../redis-job-store";
import { T0, makeParams, makeResult } from "./helpers";

const started = new Date(T0.getTime() + 1000);
const finished = new Date(T0.getTime() + 5000);

describe("registro de job no Redis", () => {
  it("usa a chave job:{id}", () => {
    expect(jobKey("abc")).toBe("job:abc");
  });

  it("grava apenas os campos definidos para um job em queued", () => {
    const job = createQueuedJob("abc", "uploads/a.wav", makeParams({ language: "pt" }), T0);

    expect(serializeJob(job)).toEqual({
      id: "abc",
      status: "queued",
      audioRef: "uploads/a.wav",
      params: JSON.stringify(job.params),
      progress: "0",
      createdAt: "2026-01-01T00:00:00.000Z"
    });
  });

  it("le de volta um job concluido", () => {
    const queued = createQueuedJob("abc", "uploads/a.wav", makeParams({ wordTimestamps: true }), T0);
    const processing = applyJobPatch(queued, markProcessing(started));
    const completed = applyJobPatch(processing, markCompleted({ ...makeResult(), processingTime: 4 }, finished));

    const hash = serializeJob(completed);
    expect(hash.completedAt).toBe("2026-01-01T00:00:05.000Z");
    expect(deserializeJob(hash)).toEqual(completed);
  });

  it("le de volta um job com falha", () => {
    const queued = createQueuedJob("abc", "uploads/a.wav", makeParams(), T0);
    const failed = applyJobPatch(applyJobPatch(queued, markProcessing(started)), markFailed("sem audio", finished));

    const restored = deserializeJob(serializeJob(failed));
    expect(restored).toEqual(failed);
    expect("result" in restored).toBe(false);
  });

  it("rejeita hash com status desconhecido", () => {
    const hash = serializeJob(createQueuedJob("abc", "a.wav", makeParams(), T0));
    expect(() => deserializeJob({ ...hash, status: "paused" })).toThrow(InfrastructureError);
  });

  it("rejeita params que nao sao JSON", () => {
    const hash = serializeJob(createQueuedJob("abc", "a.wav", makeParams(), T0));
    expect(() => deserializeJob({ ...hash, params: "{quebrado" })).toThrow(/^Registro de job corrompido/);
  });

  it("rejeita job concluido sem resultado", () => {
    const queued = createQueuedJob("abc", "a.wav", makeParams(), T0);
    const completed = applyJobPatch(applyJobPatch(queued, markProcessing(started)), markCompleted(makeResult(), finished));
    const { result: _result, ...hash } = serializeJob(completed);

    expect(() => deserializeJob(hash)).toThrow("Registro de job abc sem result em completed");
  });
});
