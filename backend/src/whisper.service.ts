import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { spawn } from "node:child_process";
import { z } from "zod";
import { ProcessingError } from "./errors";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type {
  TranscriptionEngine,
  TranscriptionParams,
  TranscriptionResult,
  TranscriptionSegment,
  TranscriptionWord
} from "./transcription";

export interface WhisperConfig {
  whisperPath: string;
  modelPath: string;
  ffmpegPath: string;
  threads: number;
}

const SAMPLE_RATE = 16000;
const WAV_HEADER_BYTES = 44;
const DEFAULT_MAX_SPEAKERS = 2;
const VAD_FILTER = "silenceremove=stop_periods=-1:stop_duration=0.7:stop_threshold=-35dB";

const offsetsSchema = z.object({ from: z.number(), to: z.number() });

const whisperTokenSchema = z.object({
  text: z.string(),
  offsets: offsetsSchema,
  p: z.number().optional()
});

const whisperSegmentSchema = z.object({
  offsets: offsetsSchema,
  text: z.string(),
  tokens: z.array(whisperTokenSchema).optional(),
  speaker_turn_next: z.boolean().optional()
});

// Saida de `whisper-cli -ojf` (apenas os campos usados).
export const whisperOutputSchema = z.object({
  model: z.object({ type: z.string().optional() }).optional(),
  result: z.object({ language: z.string().optional() }).optional(),
  transcription: z.array(whisperSegmentSchema)
});

export type WhisperOutput = z.infer<typeof whisperOutputSchema>;
type WhisperToken = z.infer<typeof whisperTokenSchema>;

function runCommand(command: string, args: string[], errPrefix: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args);

    let stderr = "";
    proc.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    proc.on("error", (err) => {
      reject(new ProcessingError(`${errPrefix}: ${err.message}`, { cause: err }));
    });

    proc.on("close", (code) => {
      if (code !== 0) {
        reject(new ProcessingError(`${errPrefix}: codigo ${code}. ${stderr}`.trim()));
        return;
      }
      resolve();
    });
  });
}

export function buildFfmpegArgs(inputFile: string, outputFile: string, params: TranscriptionParams): string[] {
  const args = ["-y", "-i", inputFile, "-ac", "1", "-ar", String(SAMPLE_RATE)];
  if (params.vadFilter) {
    args.push("-af", VAD_FILTER);
  }
  args.push("-c:a", "pcm_s16le", outputFile);
  return args;
}

export function buildWhisperArgs(
  config: WhisperConfig,
  params: TranscriptionParams,
  inputFile: string,
  outputBase: string
): string[] {
  const args = [
    "-m", config.modelPath,
    "-f", inputFile,
    "-l", params.language ?? "auto",
    "-bs", String(params.beamSize),
    "-t", String(config.threads),
    "-ojf",
    "-of", outputBase,
    "-np"
  ];
  if (params.task === "translate") args.push("-tr");
  if (params.enableDiarization) args.push("-tdrz");
  return args;
}

function isSpecialToken(token: WhisperToken): boolean {
  return /^\s*\[_/.test(token.text);
}

function toSeconds(ms: number): number {
  return ms / 1000;
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

// Tokens que comecam com espaco abrem uma nova palavra; os demais continuam a anterior.
export function tokensToWords(tokens: WhisperToken[], speaker?: string): TranscriptionWord[] {
  const words: Array<{ text: string; start: number; end: number; probabilities: number[] }> = [];
  for (const token of tokens) {
    if (isSpecialToken(token)) continue;
    const current = words[words.length - 1];
    if (!current || token.text.startsWith(" ")) {
      words.push({ text: token.text, start: token.offsets.from, end: token.offsets.to, probabilities: [] });
    } else {
      current.text += token.text;
      current.end = token.offsets.to;
    }
    if (token.p !== undefined) words[words.length - 1].probabilities.push(token.p);
  }

  return words
    .filter((word) => word.text.trim().length > 0)
    .map((word) => ({
      word: word.text.trim(),
      start: toSeconds(word.start),
      end: toSeconds(word.end),
      probability: mean(word.probabilities),
      ...(speaker ? { speaker } : {})
    }));
}

function speakerLabel(index: number): string {
  return `SPEAKER_${String(index).padStart(2, "0")}`;
}

export function mapWhisperOutput(
  output: WhisperOutput,
  params: TranscriptionParams,
  meta: { duration: number; model: string }
): TranscriptionResult {
  const maxSpeakers = params.maxSpeakers ?? DEFAULT_MAX_SPEAKERS;
  const probabilities: number[] = [];
  const speakers = new Set<string>();
  let speakerIndex = 0;

  const segments: TranscriptionSegment[] = output.transcription.map((raw, id) => {
    const tokens = raw.tokens ?? [];
    for (const token of tokens) {
      if (!isSpecialToken(token) && token.p !== undefined) probabilities.push(token.p);
    }

    const segment: TranscriptionSegment = {
      id,
      start: toSeconds(raw.offsets.from),
      end: toSeconds(raw.offsets.to),
      text: raw.text.replace("[SPEAKER_TURN]", "").trim()
    };

    if (params.enableDiarization) {
      segment.speaker = speakerLabel(speakerIndex);
      speakers.add(segment.speaker);
      if (raw.speaker_turn_next) speakerIndex = (speakerIndex + 1) % maxSpeakers;
    }
    if (params.wordTimestamps) {
      segment.words = tokensToWords(tokens, segment.speaker);
    }
    return segment;
  });

  const result: TranscriptionResult = {
    text: segments
      .map((segment) => segment.text)
      .filter((text) => text.length > 0)
      .join(" "),
    language: output.result?.language ?? params.language ?? "unknown",
    confidence: mean(probabilities),
    duration: meta.duration,
    segments,
    model: output.model?.type ?? meta.model,
    wordTimestamps: params.wordTimestamps
  };

  if (params.enableDiarization) {
    const labels = [...speakers].sort();
    result.diarization = { numSpeakers: labels.length, speakers: labels };
  }
  return result;
}

/** "/models/ggml-base.bin" -> "ggml-base" */
export function modelNameOf(modelPath: string): string {
  return path.basename(modelPath, path.extname(modelPath));
}

export class WhisperService implements TranscriptionEngine {
  private readonly config: WhisperConfig;

  constructor(config: WhisperConfig, private readonly logger: Logger = silentLogger) {
    this.config = config;
  }

  get modelName(): string {
    return modelNameOf(this.config.modelPath);
  }

  async transcribe(audioRef: string, params: TranscriptionParams): Promise<TranscriptionResult> {
    const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "whisper-job-"));
    const normalizedInput = path.join(workDir, "normalized.wav");
    const outputBase = path.join(workDir, "transcript");

    try {
      // Normaliza para mono 16k; com vadFilter remove trechos de silencio.
      await runCommand(
        this.config.ffmpegPath,
        buildFfmpegArgs(audioRef, normalizedInput, params),
        "Erro ao normalizar audio com ffmpeg"
      );

      const { size } = await fs.promises.stat(normalizedInput);
      const duration = Math.max(0, size - WAV_HEADER_BYTES) / (SAMPLE_RATE * 2);

      this.logger.debug(`whisper ${this.modelName} em ${audioRef} (${duration.toFixed(1)}s)`);
      await runCommand(
        this.config.whisperPath,
        buildWhisperArgs(this.config, params, normalizedInput, outputBase),
        "Erro na transcricao com whisper"
      );

      const raw = await fs.promises.readFile(`${outputBase}.json`, "utf-8");
      return mapWhisperOutput(parseWhisperOutput(raw), params, { duration, model: this.modelName });
    } finally {
      fs.promises.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
        this.logger.warn(`Falha ao remover ${workDir}: ${error instanceof Error ? error.message : String(error)}`);
      });
    }
  }
}

export function parseWhisperOutput(raw: string): WhisperOutput {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ProcessingError("Saida do whisper nao e um JSON valido.");
  }
  const parsed = whisperOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProcessingError(`Saida do whisper em formato inesperado: ${parsed.error.issues[0]?.message ?? "formato invalido"}`);
  }
  return parsed.data;
}
