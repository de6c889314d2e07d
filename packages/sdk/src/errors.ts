/**
 * TaskMatch SDK Error Classes
 * Custom error types for discovery operations
 */

export class TaskMatchError extends Error {
  constructor(
    message: string,
    public code: string,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'TaskMatchError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends TaskMatchError {
  constructor(message: string, code: string = 'VALIDATION_ERROR') {
    super(message, code, false);
    this.name = 'ValidationError';
  }
}

export class RegistryError extends TaskMatchError {
  constructor(
    message: string,
    public status?: number
  ) {
    super(message, 'REGISTRY_ERROR', true);
    this.name = 'RegistryError';
  }
}

export class TimeoutError extends TaskMatchError {
  constructor(message: string, retryable: boolean = true) {
    super(message, 'TIMEOUT', retryable);
    this.name = 'TimeoutError';
  }
}

/**
 * Normalize anything thrown by fetch or JSON parsing into a registry failure
 */
export function toRegistryError(error: unknown): RegistryError | TimeoutError {
  if (error instanceof RegistryError || error instanceof TimeoutError) {
    return error;
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new TimeoutError('Registry request timed out');
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RegistryError(message);
}
