import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from "prom-client";
import type { WorkQueue } from "./queue";

export interface MetricsOptions {
  /** Tamanho da fila exposto como gauge no momento da coleta. */
  queue?: WorkQueue;
  defaultMetrics?: boolean;
}

export interface TranscriptionMetrics {
  readonly registry: Registry;
  recordCompleted(sample: { duration: number; processingTime: number }): void;
  recordFailed(): void;
}

export function createMetrics(options: MetricsOptions = {}): TranscriptionMetrics {
  const registry = new Registry();
  if (options.defaultMetrics) {
    collectDefaultMetrics({ register: registry });
  }

  const transcriptions = new Counter({
    name: "transcriptions_total",
    help: "Total de transcricoes concluidas",
    registers: [registry]
  });
  const errors = new Counter({
    name: "transcription_errors_total",
    help: "Total de transcricoes com falha",
    registers: [registry]
  });
  const processingDuration = new Histogram({
    name: "transcription_duration_seconds",
    help: "Tempo de processamento por transcricao",
    buckets: [1, 5, 10, 30, 60, 120, 300, 600, 1800],
    registers: [registry]
  });
  const audioDuration = new Histogram({
    name: "audio_duration_seconds",
    help: "Duracao dos audios processados",
    buckets: [5, 15, 30, 60, 300, 600, 1800, 3600, 7200],
    registers: [registry]
  });

  const { queue } = options;
  if (queue) {
    new Gauge({
      name: "transcription_queue_length",
      help: "Jobs aguardando na fila",
      registers: [registry],
      async collect() {
        this.set(await queue.length());
      }
    });
  }

  return {
    registry,
    recordCompleted: ({ duration, processingTime }) => {
      transcriptions.inc();
      processingDuration.observe(processingTime);
      audioDuration.observe(duration);
    },
    recordFailed: () => {
      errors.inc();
    }
  };
}
