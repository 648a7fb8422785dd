export type InterviewErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_STATE'
  | 'MODEL_CALL_FAILED'
  | 'REPORT_GENERATION_FAILED';

export class InterviewError extends Error {
  constructor(
    public readonly code: InterviewErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid caller input. Never retried. */
export class ValidationError extends InterviewError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
  }
}

/** Session used out of sequence. The caller should restart the session. */
export class InvalidStateError extends InterviewError {
  constructor(message: string) {
    super('INVALID_STATE', message);
  }
}

/** Transport, timeout or provider failure of a model call. */
export class ModelCallError extends InterviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MODEL_CALL_FAILED', message, options);
  }
}

export class ReportGenerationError extends InterviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('REPORT_GENERATION_FAILED', message, options);
  }
}

export const isRecoverable = (error: unknown): error is InterviewError =>
  error instanceof InterviewError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
