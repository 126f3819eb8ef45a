/**
 * Failure kinds a pipeline run can end with. The HTTP layer and the
 * frontend branch on these instead of on message text.
 */
export type PipelineErrorKind =
  | "UnsupportedFile"
  | "DecodeError"
  | "OCRError"
  | "LLMRequestError"
  | "LLMParseError";

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/**
 * Raised at startup when the environment does not describe a usable configuration.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}

/**
 * Attaches a failure kind to whatever a stage threw. An existing
 * PipelineError keeps its own kind, so the innermost stage wins.
 */
export function wrapError(error: unknown, kind: PipelineErrorKind, context?: string): PipelineError {
  if (error instanceof PipelineError) return error;
  const message = context ? `${context}: ${errorMessage(error)}` : errorMessage(error);
  return new PipelineError(kind, message, { cause: error });
}
