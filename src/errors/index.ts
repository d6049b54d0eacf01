// Base error class for all chunkwise errors
export class ChunkwiseError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'ChunkwiseError';
  }
}

// Validation error for schema and option validation failures
export class ValidationError extends ChunkwiseError {
  constructor(message: string, public override readonly cause?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Configuration error for missing or unreadable configuration
export class ConfigError extends ChunkwiseError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Generation backend failures (network, API-reported errors, malformed responses)
export class BackendError extends ChunkwiseError {
  constructor(
    message: string,
    public readonly provider: string,
    public override readonly cause?: unknown,
    code: string = 'BACKEND_ERROR'
  ) {
    super(message, code);
    this.name = 'BackendError';
  }
}

// A backend call that exceeded its per-call timeout
export class BackendTimeoutError extends BackendError {
  constructor(provider: string, public readonly timeoutMs: number, cause?: unknown) {
    super(`${provider} call timed out after ${timeoutMs}ms`, provider, cause, 'BACKEND_TIMEOUT');
    this.name = 'BackendTimeoutError';
  }
}

// The caller aborted the pipeline through its cancellation signal
export class PipelineCancelledError extends ChunkwiseError {
  constructor(message: string = 'Summarization was cancelled') {
    super(message, 'PIPELINE_CANCELLED');
    this.name = 'PipelineCancelledError';
  }
}

// Reduction could not bring the combined summaries under the chunk budget
export class ReductionError extends ChunkwiseError {
  constructor(message: string, public readonly rounds: number) {
    super(message, 'REDUCTION_ERROR');
    this.name = 'ReductionError';
  }
}

// Backend responded, but not in the shape we expect
export class APIResponseError extends ValidationError {
  constructor(message: string, public readonly response: unknown, cause?: unknown) {
    super(`API Response Error: ${message}`, cause);
    this.name = 'APIResponseError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
