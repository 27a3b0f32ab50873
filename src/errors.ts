export type ErrorCode = 'invalid_input' | 'source_unavailable';

export class PipelineError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller-supplied input (or a fact row) that cannot be processed. Nothing is fetched or emitted. */
export class InvalidInputError extends PipelineError {
  constructor(message: string, readonly detail?: Record<string, unknown>) {
    super('invalid_input', message);
  }
}

/** Connectivity, timeout, auth or breaker failure of one data source. */
export class SourceUnavailableError extends PipelineError {
  constructor(readonly source: string, message: string, cause?: unknown) {
    super('source_unavailable', `${source}: ${message}`, { cause });
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
