/**
 * Error Types
 *
 * Error hierarchy for request dispatch. Runtime failures are returned as
 * values inside a {@link Result}; only {@link ConfigurationError} is thrown,
 * and only while a service descriptor or configuration is being built.
 *
 * @module error
 */

/**
 * Error codes for every failure kind the core produces.
 */
export type CoreErrorCode =
  | 'TRANSPORT' // Bad URL, timeout or network failure
  | 'DECODE' // Decoder rejected a well-formed HTTP response
  | 'SERVICE' // Remote API returned a structured error payload
  | 'SIGNING_UNSUPPORTED' // Descriptor names a scheme with no signer
  | 'CLOCK' // Current time could not be obtained
  | 'CONFIGURATION'; // Invalid descriptor or configuration

/**
 * Base error class.
 *
 * @example
 * ```typescript
 * if (error instanceof CoreError) {
 *   console.error(error.code, error.message);
 * }
 * ```
 */
export class CoreError extends Error {
  /**
   * Error code identifying the failure kind.
   */
  public readonly code: CoreErrorCode;

  constructor(message: string, code: CoreErrorCode) {
    super(message);
    this.name = 'CoreError';
    this.code = code;

    // Maintain proper stack trace in V8 engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Convert error to a plain object for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Why the transport could not produce a response.
 */
export type TransportErrorReason = 'bad-url' | 'timeout' | 'network';

/**
 * Network-level failure. Raised before any decoder runs and never retried
 * by the core.
 */
export class TransportError extends CoreError {
  public readonly reason: TransportErrorReason;

  constructor(message: string, reason: TransportErrorReason) {
    super(message, 'TRANSPORT');
    this.name = 'TransportError';
    this.reason = reason;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason };
  }
}

/**
 * Why a decoder rejected a response.
 *
 * - `bad-body`: the decoder inspected the body and could not use it
 * - `bad-status`: the status was outside 2xx and the decoder only accepts success
 */
export type DecodeErrorReason = 'bad-body' | 'bad-status';

/**
 * A well-formed HTTP response that the request's decoder did not accept.
 */
export class DecodeError extends CoreError {
  public readonly reason: DecodeErrorReason;
  public readonly status: number;

  constructor(message: string, reason: DecodeErrorReason, status: number) {
    super(message, 'DECODE');
    this.name = 'DecodeError';
    this.reason = reason;
    this.status = status;
  }

  /**
   * Decoder rejected the body with a descriptive message.
   */
  static badBody(message: string, status: number): DecodeError {
    return new DecodeError(message, 'bad-body', status);
  }

  /**
   * Status outside 2xx reached a decoder that only handles success.
   */
  static badStatus(status: number): DecodeError {
    return new DecodeError(`Unexpected HTTP status ${status}`, 'bad-status', status);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason, status: this.status };
  }
}

/**
 * The remote API answered with an error payload that the request's error
 * decoder understood. Carries the caller's typed error value.
 *
 * @template E - Error value produced by the error decoder
 */
export class ServiceError<E> extends CoreError {
  public readonly error: E;
  public readonly status: number;
  public readonly requestId?: string;

  constructor(error: E, status: number, requestId?: string) {
    super(`Service returned an error (HTTP ${status})`, 'SERVICE');
    this.name = 'ServiceError';
    this.error = error;
    this.status = status;
    this.requestId = requestId;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      requestId: this.requestId,
      error: this.error,
    };
  }
}

/**
 * The descriptor names a signing scheme with no signer. Returned before any
 * network call is attempted.
 */
export class SigningUnsupportedError extends CoreError {
  public readonly scheme: string;

  constructor(scheme: string) {
    super(`Signing scheme '${scheme}' is not implemented`, 'SIGNING_UNSUPPORTED');
    this.name = 'SigningUnsupportedError';
    this.scheme = scheme;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), scheme: this.scheme };
  }
}

/**
 * The clock collaborator failed to supply the current time.
 */
export class ClockError extends CoreError {
  constructor(message: string) {
    super(message, 'CLOCK');
    this.name = 'ClockError';
  }
}

/**
 * Invalid service descriptor or configuration. Thrown at configuration time.
 */
export class ConfigurationError extends CoreError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/**
 * Every failure a dispatch can return.
 *
 * @template E - Error value produced by the request's error decoder
 */
export type DispatchFailure<E> =
  | TransportError
  | DecodeError
  | ServiceError<E>
  | SigningUnsupportedError
  | ClockError;

/**
 * Type for operation results.
 */
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Type guard for CoreError.
 */
export function isCoreError(error: unknown): error is CoreError {
  return error instanceof CoreError;
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
