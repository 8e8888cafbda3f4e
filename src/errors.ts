export type ErrorKind = 'environment' | 'format' | 'file' | 'transform' | 'encode';

export class ConversionError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** The graphics library is missing or failed to load. */
export class EnvironmentError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('environment', message, options);
  }
}

export class FormatError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('format', message, options);
  }
}

export class FileError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('file', message, options);
  }
}

export class TransformError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transform', message, options);
  }
}

export class EncodeError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('encode', message, options);
  }
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}

export type Result<T, E = ConversionError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
