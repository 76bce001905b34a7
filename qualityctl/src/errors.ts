export enum QualityErrorCode {
  CONFIG_NOT_FOUND = "CONFIG_NOT_FOUND",
  CONFIG_MISSING_KEY = "CONFIG_MISSING_KEY",
  CONFIG_INVALID_VALUE = "CONFIG_INVALID_VALUE",
  CONFIG_ORPHAN_KEY = "CONFIG_ORPHAN_KEY",
  DIMENSION_MISMATCH = "DIMENSION_MISMATCH",
  EMPTY_INPUT = "EMPTY_INPUT",
  INVALID_INPUT = "INVALID_INPUT",
  EXPERIMENT_NOT_FOUND = "EXPERIMENT_NOT_FOUND",
  ARTIFACT_NOT_FOUND = "ARTIFACT_NOT_FOUND",
  INVALID_ARTIFACT = "INVALID_ARTIFACT",
}

export class QualityError extends Error {
  readonly code: QualityErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: QualityErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "QualityError";
    this.code = code;
    this.context = context;
  }
}

/** Errors raised by a bad threshold file or lookup. */
export function isConfigError(err: unknown): err is QualityError {
  return err instanceof QualityError && err.code.startsWith("CONFIG_");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
