import { z } from "zod";
import { ParamsValidationError } from "./errors";
import languages from "./languages.json";

export const TRANSCRIPTION_TASKS = ["transcribe", "translate"] as const;
export type TranscriptionTask = (typeof TRANSCRIPTION_TASKS)[number];

/** Codigos aceitos pelo whisper; ausencia de idioma significa deteccao automatica. */
export const SUPPORTED_LANGUAGES: readonly string[] = languages;

const supportedLanguageSet = new Set(SUPPORTED_LANGUAGES);

export function isSupportedLanguage(code: string): boolean {
  return supportedLanguageSet.has(code);
}

const speakerBound = z.number().int().min(1).max(32).nullable().default(null);

export const transcriptionParamsSchema = z
  .object({
    language: z
      .string()
      .trim()
      .toLowerCase()
      .refine(isSupportedLanguage, (code) => ({ message: `idioma nao suportado: ${code}` }))
      .nullable()
      .default(null),
    task: z.enum(TRANSCRIPTION_TASKS).default("transcribe"),
    beamSize: z.number().int().min(1, "beamSize deve estar entre 1 e 10").max(10, "beamSize deve estar entre 1 e 10").default(5),
    vadFilter: z.boolean().default(true),
    wordTimestamps: z.boolean().default(false),
    enableDiarization: z.boolean().default(false),
    minSpeakers: speakerBound,
    maxSpeakers: speakerBound,
    originalFilename: z.string().optional()
  })
  .strict()
  .refine(
    (params) => params.minSpeakers === null || params.maxSpeakers === null || params.minSpeakers <= params.maxSpeakers,
    { message: "minSpeakers nao pode ser maior que maxSpeakers", path: ["minSpeakers"] }
  );

export type TranscriptionParams = Readonly<z.infer<typeof transcriptionParamsSchema>>;

// Campos multipart chegam como texto; string vazia significa "nao informado".
const formText = z.preprocess((value) => (value === "" ? undefined : value), z.string().optional());

const formBoolean = z.preprocess((value) => {
  if (value === "" || value === undefined) return undefined;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  return value;
}, z.boolean().optional());

const formInteger = z.preprocess((value) => {
  if (value === "" || value === undefined) return undefined;
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return value;
}, z.number().optional());

const formParamsSchema = z.object({
  language: formText,
  task: formText,
  beamSize: formInteger,
  vadFilter: formBoolean,
  wordTimestamps: formBoolean,
  enableDiarization: formBoolean,
  minSpeakers: formInteger,
  maxSpeakers: formInteger
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseTranscriptionParams(input: unknown): TranscriptionParams {
  const parsed = transcriptionParamsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ParamsValidationError(`Parametros invalidos: ${describeIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

/** Converte os campos de um formulario multipart e valida como {@link parseTranscriptionParams}. */
export function parseFormParams(body: unknown, originalFilename?: string): TranscriptionParams {
  const form = formParamsSchema.safeParse(body ?? {});
  if (!form.success) {
    throw new ParamsValidationError(`Parametros invalidos: ${describeIssues(form.error)}`);
  }

  const { language, minSpeakers, maxSpeakers, ...rest } = form.data;
  return parseTranscriptionParams({
    ...rest,
    language: language ?? null,
    minSpeakers: minSpeakers ?? null,
    maxSpeakers: maxSpeakers ?? null,
    originalFilename
  });
}

export const transcriptionWordSchema = z.object({
  word: z.string(),
  start: z.number(),
  end: z.number(),
  probability: z.number(),
  speaker: z.string().optional()
});

export const transcriptionSegmentSchema = z.object({
  id: z.number().int(),
  start: z.number(),
  end: z.number(),
  text: z.string(),
  speaker: z.string().optional(),
  words: z.array(transcriptionWordSchema).optional()
});

export const transcriptionResultSchema = z.object({
  text: z.string(),
  language: z.string(),
  confidence: z.number(),
  duration: z.number(),
  segments: z.array(transcriptionSegmentSchema),
  model: z.string(),
  wordTimestamps: z.boolean(),
  diarization: z
    .object({
      numSpeakers: z.number().int(),
      speakers: z.array(z.string())
    })
    .optional(),
  processingTime: z.number().optional()
});

export type TranscriptionWord = z.infer<typeof transcriptionWordSchema>;
export type TranscriptionSegment = z.infer<typeof transcriptionSegmentSchema>;
export type TranscriptionResult = z.infer<typeof transcriptionResultSchema>;

/** Capacidade externa de transcricao. O core so repassa parametros e guarda o resultado. */
export interface TranscriptionEngine {
  transcribe(audioRef: string, params: TranscriptionParams): Promise<TranscriptionResult>;
}
