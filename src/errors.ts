/**
 * Error codes raised by the codec engine.
 *
 * - `unknown_type`: a type tag or type name that maps to no known type
 * - `structural_mismatch`: a carrier node that does not have the expected shape
 * - `instantiation_failed`: no usable type constructor for a class
 * - `construction_failed`: a codec that cannot be built for a type
 * - `uninitialised_reference`: a forwarding codec used before its target exists
 * - `invalid_config`: rejected configuration
 * - `not_implemented`: an operation a carrier codec did not provide
 */
export type CodecErrorCode =
  | 'unknown_type'
  | 'structural_mismatch'
  | 'instantiation_failed'
  | 'construction_failed'
  | 'uninitialised_reference'
  | 'invalid_config'
  | 'not_implemented'
  | 'codec_failure';

export type CodecErrorContext = Readonly<Record<string, unknown>>;

export interface CodecErrorOptions {
  code?: CodecErrorCode;
  context?: CodecErrorContext;
  cause?: unknown;
}

export interface SerializedCodecError {
  name: string;
  code: CodecErrorCode;
  message: string;
  context: Record<string, unknown>;
  cause?: SerializedCodecError | { name: string; message: string };
}

/**
 * The single error type surfaced by encode, decode and codec resolution.
 */
export class CodecError extends Error {
  readonly code: CodecErrorCode;
  readonly context: CodecErrorContext;

  constructor(message: string, options: CodecErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code ?? 'codec_failure';
    this.context = Object.freeze({ ...options.context });

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): SerializedCodecError {
    const cause = this.cause;
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      ...(cause instanceof CodecError && { cause: cause.toJSON() }),
      ...(cause instanceof Error &&
        !(cause instanceof CodecError) && { cause: { name: cause.name, message: cause.message } }),
    };
  }
}

/**
 * Marks an abstract-method default that a carrier codec failed to override.
 */
export class OperationNotImplementedError extends CodecError {
  constructor(operation: string) {
    super(`Operation not implemented: ${operation}`, {
      code: 'not_implemented',
      context: { operation },
    });
  }
}

export function isCodecError(err: unknown): err is CodecError {
  return err instanceof CodecError;
}

/**
 * Convert anything thrown while manipulating a carrier into a `CodecError`.
 * A `CodecError` is returned unchanged so that its code survives nesting.
 */
export function wrapError(err: unknown, message: string, context?: CodecErrorContext): CodecError {
  if (err instanceof CodecError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new CodecError(`${message}: ${detail}`, { cause: err, context });
}
