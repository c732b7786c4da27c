export class PipelineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Embedding or vector-index failure. No partial context is ever used. */
export class RetrievalError extends PipelineError {}

export class GenerationError extends PipelineError {}

export class ExecutionError extends PipelineError {}

export class StatementTimeoutError extends ExecutionError {}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
