export type PipelineErrorCode =
  | 'LLM_UNAVAILABLE'
  | 'GENERATION_AMBIGUOUS'
  | 'GENERATION_INVALID'
  | 'TABLE_SELECTION_FAILED'
  | 'SQL_REJECTED'
  | 'EXECUTION_TIMEOUT'
  | 'EXECUTION_ERROR'
  | 'ATTEMPT_STATE'
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'CONFIGURATION'
  | 'INTERNAL';

export class PipelineError extends Error {
  constructor(
    message: string,
    readonly code: PipelineErrorCode,
    readonly details?: string
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

const HTTP_STATUS: Record<PipelineErrorCode, number> = {
  LLM_UNAVAILABLE: 503,
  GENERATION_AMBIGUOUS: 422,
  GENERATION_INVALID: 422,
  TABLE_SELECTION_FAILED: 422,
  SQL_REJECTED: 400,
  EXECUTION_TIMEOUT: 408,
  EXECUTION_ERROR: 422,
  ATTEMPT_STATE: 400,
  INVALID_REQUEST: 400,
  NOT_FOUND: 404,
  FORBIDDEN: 403,
  CONFIGURATION: 500,
  INTERNAL: 500
};

export function httpStatusFor(code: PipelineErrorCode): number {
  return HTTP_STATUS[code];
}

export function getErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string' && error) return error;
  return fallback;
}
