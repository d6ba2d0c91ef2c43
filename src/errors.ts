export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'EngineError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class EmptyInputError extends EngineError {
  constructor(stage: string) {
    super(`Input data is empty (${stage})`, 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

export class MissingFieldError extends EngineError {
  constructor(
    public readonly field: string,
    public readonly index: number,
  ) {
    super(`Missing required field "${field}" at bar ${index}`, 'MISSING_FIELD');
    this.name = 'MissingFieldError';
  }
}

export class SignalInconsistencyError extends EngineError {
  constructor(
    message: string,
    public readonly index?: number,
  ) {
    super(message, 'SIGNAL_INCONSISTENCY');
    this.name = 'SignalInconsistencyError';
  }
}

export class InvalidBarError extends EngineError {
  constructor(
    message: string,
    public readonly index?: number,
  ) {
    super(message, 'INVALID_BAR');
    this.name = 'InvalidBarError';
  }
}

export class ConfigValidationError extends EngineError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigValidationError';
  }
}

export interface SerializedError {
  name: string;
  code?: string;
  message: string;
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof EngineError) {
    return { name: err.name, code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'Error', message: String(err) };
}
