import { EventEmitter } from "node:events";
import { errorMessage } from "./errors";
import type { JobStatus } from "./job";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";

export interface JobStatusEvent {
  jobId: string;
  status: JobStatus;
  progress: number;
  publishedAt: string;
}

/**
 * Escuta ao vivo dos eventos de um job. Nao e um log: so recebe o que for
 * publicado depois do subscribe, ate close().
 */
export interface JobSubscription extends AsyncIterable<JobStatusEvent> {
  close(): Promise<void>;
}

/**
 * Canal de broadcast por job, sem replay e sem persistencia.
 * Quem assina depois de um publish nunca ve aquele evento. publish nunca
 * rejeita: falhas sao registradas e descartadas.
 */
export interface StatusNotifier {
  publish(event: JobStatusEvent): Promise<void>;
  subscribe(jobId: string): Promise<JobSubscription>;
  close(): Promise<void>;
}

export function statusChannel(jobId: string): string {
  return `job:${jobId}:status`;
}

export function createStatusEvent(jobId: string, status: JobStatus, progress: number, now = new Date()): JobStatusEvent {
  return { jobId, status, progress, publishedAt: now.toISOString() };
}

/**
 * Ponte push -> AsyncIterable. Eventos entregues enquanto o consumidor ainda
 * nao pediu o proximo ficam pendentes apenas para este assinante.
 */
export class SubscriptionChannel implements JobSubscription {
  private readonly pending: JobStatusEvent[] = [];
  private readonly waiters: Array<(result: IteratorResult<JobStatusEvent>) => void> = [];
  private closed = false;

  constructor(private readonly onClose: () => Promise<void> | void) {}

  push(event: JobStatusEvent): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
      return;
    }
    this.pending.push(event);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.pending.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    await this.onClose();
  }

  [Symbol.asyncIterator](): AsyncIterator<JobStatusEvent> {
    return {
      next: (): Promise<IteratorResult<JobStatusEvent>> => {
        const event = this.pending.shift();
        if (event) return Promise.resolve({ value: event, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise<IteratorResult<JobStatusEvent>>((resolve) => {
          this.waiters.push(resolve);
        });
      },
      return: async (): Promise<IteratorResult<JobStatusEvent>> => {
        await this.close();
        return { value: undefined, done: true };
      }
    };
  }
}

export class InMemoryStatusNotifier implements StatusNotifier {
  private readonly emitter = new EventEmitter();

  constructor(private readonly logger: Logger = silentLogger) {
    this.emitter.setMaxListeners(0);
  }

  async publish(event: JobStatusEvent): Promise<void> {
    try {
      this.emitter.emit(statusChannel(event.jobId), event);
    } catch (error) {
      this.logger.warn(`Falha ao publicar status do job ${event.jobId}: ${errorMessage(error)}`);
    }
  }

  async subscribe(jobId: string): Promise<JobSubscription> {
    const channel = statusChannel(jobId);
    const listener = (event: JobStatusEvent) => subscription.push(event);
    const subscription = new SubscriptionChannel(() => {
      this.emitter.off(channel, listener);
    });
    this.emitter.on(channel, listener);
    return subscription;
  }

  listenerCount(jobId: string): number {
    return this.emitter.listenerCount(statusChannel(jobId));
  }

  async close(): Promise<void> {
    this.emitter.removeAllListeners();
  }
}
