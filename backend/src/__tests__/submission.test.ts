import { describe, expect, it } from "vitest";
import { InfrastructureError } from "../errors";
import { markProcessing } from "../job";
import { InMemoryJobStore } from "../job-store";
import { InMemoryStatusNotifier } from "../notifier";
import { InMemoryWorkQueue } from "../queue";
import { reconcileOrphanedJobs } from "../reconcile";
import { SubmissionService } from "../submission.service";
import { TestClock, makeParams } from "./helpers";

class FlakyQueue extends InMemoryWorkQueue {
  failures = 1;

  async enqueue(id: string): Promise<void> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error("redis indisponivel");
    }
    await super.enqueue(id);
  }
}

function setup(queue = new InMemoryWorkQueue()) {
  const clock = new TestClock();
  const store = new InMemoryJobStore({ notifier: new InMemoryStatusNotifier(), now: clock.now });
  return { clock, store, queue, submission: new SubmissionService(store, queue) };
}

describe("SubmissionService", () => {
  it("grava o job e enfileira o id", async () => {
    const { store, queue, submission } = setup();
    const id = await submission.submit({ audioRef: "a.wav", params: makeParams({ language: "pt" }) });

    expect(await store.get(id)).toMatchObject({ status: "queued", audioRef: "a.wav", params: { language: "pt" } });
    expect(await queue.pending()).toEqual([id]);
  });

  it("mantem o registro quando o enqueue falha", async () => {
    const { store, queue, submission } = setup(new FlakyQueue());

    await expect(submission.submit({ audioRef: "a.wav", params: makeParams() })).rejects.toBeInstanceOf(
      InfrastructureError
    );

    const [orphan] = await store.list();
    expect(orphan).toMatchObject({ status: "queued", audioRef: "a.wav" });
    expect(await queue.length()).toBe(0);
  });
});

describe("reconcileOrphanedJobs", () => {
  it("reenfileira apenas jobs em queued fora da fila e mais velhos que a carencia", async () => {
    const { clock, store, queue } = setup();
    const enqueued = await store.create("1.wav", makeParams());
    await queue.enqueue(enqueued);
    const orphan = await store.create("2.wav", makeParams());
    const claimed = await store.create("3.wav", makeParams());
    await store.update(claimed, markProcessing(clock.now()));
    clock.advance(50_000);
    const recent = await store.create("4.wav", makeParams());
    clock.advance(40_000);

    const requeued = await reconcileOrphanedJobs({ store, queue, graceMs: 60_000, now: clock.now });

    expect(requeued).toBe(1);
    expect(await queue.pending()).toEqual([enqueued, orphan]);
    expect(await store.get(recent)).toMatchObject({ status: "queued" });
  });

  it("recupera o job que ficou fora da fila na submissao", async () => {
    const { clock, store, queue, submission } = setup(new FlakyQueue());
    await expect(submission.submit({ audioRef: "a.wav", params: makeParams() })).rejects.toThrow(
      "Nao foi possivel enfileirar o job"
    );
    clock.advance(61_000);

    expect(await reconcileOrphanedJobs({ store, queue, graceMs: 60_000, now: clock.now })).toBe(1);
    const [job] = await store.list();
    expect(await queue.pending()).toEqual([job.id]);
  });

  it("nao faz nada sem jobs em queued", async () => {
    const { store, queue } = setup();
    expect(await reconcileOrphanedJobs({ store, queue, graceMs: 0 })).toBe(0);
  });
});
