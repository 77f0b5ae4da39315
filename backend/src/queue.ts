/**
 * Fila FIFO de ids pendentes. O payload fica todo no JobStore.
 *
 * dequeue entrega cada id a exatamente um consumidor; e essa garantia que
 * transfere a posse do job para o worker que o retirou.
 */
export interface WorkQueue {
  enqueue(id: string): Promise<void>;
  /** Bloqueia ate haver um id ou o timeout expirar (retorna undefined). */
  dequeue(timeoutMs: number): Promise<string | undefined>;
  length(): Promise<number>;
  /** Ids ainda nao retirados, do mais antigo para o mais novo. */
  pending(): Promise<string[]>;
  close(): Promise<void>;
}

export const DEFAULT_QUEUE_NAME = "transcription_queue";

interface Waiter {
  resolve: (id: string | undefined) => void;
  timer: NodeJS.Timeout;
}

export class InMemoryWorkQueue implements WorkQueue {
  private readonly items: string[] = [];
  private readonly waiters: Waiter[] = [];

  async enqueue(id: string): Promise<void> {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(id);
      return;
    }
    this.items.push(id);
  }

  dequeue(timeoutMs: number): Promise<string | undefined> {
    const id = this.items.shift();
    if (id !== undefined) return Promise.resolve(id);
    if (timeoutMs <= 0) return Promise.resolve(undefined);

    return new Promise((resolve) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve(undefined);
        }, timeoutMs)
      };
      this.waiters.push(waiter);
    });
  }

  async length(): Promise<number> {
    return this.items.length;
  }

  async pending(): Promise<string[]> {
    return [...this.items];
  }

  async close(): Promise<void> {
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
  }
}
