export type AppErrorCode =
  | "JOB_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "RESOURCE_NOT_FOUND"
  | "PROCESSING_ERROR"
  | "INFRASTRUCTURE_ERROR"
  | "INVALID_PARAMS";

export class AppError extends Error {
  readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class JobNotFoundError extends AppError {
  constructor(readonly jobId: string) {
    super("JOB_NOT_FOUND", `Job ${jobId} nao encontrado.`);
  }
}

export class InvalidJobTransitionError extends AppError {
  constructor(readonly jobId: string, reason: string) {
    super("INVALID_TRANSITION", `Atualizacao invalida para o job ${jobId}: ${reason}`);
  }
}

// Audio sumiu entre a submissao e o claim.
export class ResourceNotFoundError extends AppError {
  constructor(readonly audioRef: string) {
    super("RESOURCE_NOT_FOUND", `Arquivo de audio nao encontrado: ${audioRef}`);
  }
}

export class ProcessingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PROCESSING_ERROR", message, options);
  }
}

/**
 * Falha do proprio store/fila (Redis fora do ar, resposta corrompida).
 * Nunca vira resultado de job: o loop do worker registra e tenta de novo.
 */
export class InfrastructureError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INFRASTRUCTURE_ERROR", message, options);
  }
}

export class ParamsValidationError extends AppError {
  constructor(message: string) {
    super("INVALID_PARAMS", message);
  }
}

export function errorMessage(error: unknown, fallback = "Erro desconhecido."): string {
  if (error instanceof Error) return error.message || fallback;
  if (typeof error === "string" && error.length > 0) return error;
  return fallback;
}
