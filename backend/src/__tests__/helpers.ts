import type { AudioStorage } from "../audio-storage";
import type { Logger } from "../logger";
import type { TranscriptionEngine, TranscriptionParams, TranscriptionResult } from "../transcription";
import { parseTranscriptionParams } from "../transcription";

export const T0 = new Date("2026-01-01T00:00:00.000Z");

export function makeParams(input: Record<string, unknown> = {}): TranscriptionParams {
  return parseTranscriptionParams(input);
}

export function makeResult(text = "ola mundo"): TranscriptionResult {
  return {
    text,
    language: "pt",
    confidence: 0.9,
    duration: 2.5,
    segments: [{ id: 0, start: 0, end: 2.5, text }],
    model: "base",
    wordTimestamps: false
  };
}

export class TestClock {
  current: Date;

  constructor(start: Date = T0) {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export class FakeStorage implements AudioStorage {
  readonly files = new Set<string>();
  readonly removed: string[] = [];
  failRemove = false;

  constructor(...refs: string[]) {
    for (const ref of refs) this.files.add(ref);
  }

  async exists(audioRef: string): Promise<boolean> {
    return this.files.has(audioRef);
  }

  async remove(audioRef: string): Promise<void> {
    if (this.failRemove) throw new Error("disco somente leitura");
    this.files.delete(audioRef);
    this.removed.push(audioRef);
  }
}

type TranscribeFn = (audioRef: string, params: TranscriptionParams) => Promise<TranscriptionResult>;

export class FakeEngine implements TranscriptionEngine {
  readonly calls: string[] = [];

  constructor(private readonly impl: TranscribeFn = async () => makeResult()) {}

  async transcribe(audioRef: string, params: TranscriptionParams): Promise<TranscriptionResult> {
    this.calls.push(audioRef);
    return this.impl(audioRef, params);
  }
}

export interface RecordingLogger extends Logger {
  lines: Array<{ level: string; message: string }>;
}

export function recordingLogger(): RecordingLogger {
  const lines: Array<{ level: string; message: string }> = [];
  const logger: RecordingLogger = {
    lines,
    debug: (message) => lines.push({ level: "debug", message }),
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message }),
    child: () => logger
  };
  return logger;
}
