import { InfrastructureError, errorMessage } from "./errors";
import type { JobStore } from "./job-store";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { WorkQueue } from "./queue";
import type { TranscriptionParams } from "./transcription";

export interface SubmitJobInput {
  audioRef: string;
  params: TranscriptionParams;
}

/**
 * Grava o registro antes de enfileirar. Se o enqueue falhar o registro fica
 * em queued e a reconciliacao periodica o coloca na fila depois.
 */
export class SubmissionService {
  constructor(
    private readonly store: JobStore,
    private readonly queue: WorkQueue,
    private readonly logger: Logger = silentLogger
  ) {}

  async submit(input: SubmitJobInput): Promise<string> {
    const id = await this.store.create(input.audioRef, input.params);

    try {
      await this.queue.enqueue(id);
    } catch (error) {
      this.logger.error(`Job ${id} gravado mas nao enfileirado: ${errorMessage(error)}`);
      throw new InfrastructureError(`Nao foi possivel enfileirar o job ${id}.`, { cause: error });
    }

    this.logger.info(`Job ${id} adicionado a fila`);
    return id;
  }
}
