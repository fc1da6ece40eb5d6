/**
 * Error types for the dataset versioning integration.
 *
 * Every failure raised by this package is a {@link DatasetVersioningError}
 * carrying a {@link FailureKind}. Retry and circuit-breaking decisions are made
 * on the kind alone, never on the concrete class or the message.
 *
 * @module errors
 */

/**
 * Failure categories.
 */
export type FailureKind =
  | 'connection'
  | 'timeout'
  | 'io'
  | 'command'
  | 'rejected'
  | 'security'
  | 'conflict'
  | 'validation'
  | 'configuration'
  | 'circuit_open'
  | 'internal';

export type TransientKind = Extract<FailureKind, 'connection' | 'timeout' | 'io'>;

export const TRANSIENT_KINDS: readonly TransientKind[] = ['connection', 'timeout', 'io'];

export interface ErrorOptions {
  operation?: string;
  statusCode?: number;
  cause?: unknown;
}

/**
 * Base error for all dataset versioning failures.
 */
export class DatasetVersioningError extends Error {
  public readonly kind: FailureKind;
  public readonly operation?: string;
  public readonly statusCode?: number;

  constructor(kind: FailureKind, message: string, options: ErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DatasetVersioningError';
    this.kind = kind;
    this.operation = options.operation;
    this.statusCode = options.statusCode;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Transient failures of an external collaborator are worth another attempt.
   */
  isRetryable(): boolean {
    return isTransientKind(this.kind);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      operation: this.operation,
      statusCode: this.statusCode,
    };
  }
}

export class TransientError extends DatasetVersioningError {
  constructor(kind: TransientKind, message: string, options: ErrorOptions = {}) {
    super(kind, message, options);
    this.name = 'TransientError';
  }
}

/**
 * Non-2xx application response from the hosting service or a file source.
 */
export class ApplicationRejectedError extends DatasetVersioningError {
  constructor(message: string, statusCode: number, options: Omit<ErrorOptions, 'statusCode'> = {}) {
    super('rejected', message, { ...options, statusCode });
    this.name = 'ApplicationRejectedError';
  }
}

export class SecurityError extends DatasetVersioningError {
  constructor(message: string, options: ErrorOptions = {}) {
    super('security', message, options);
    this.name = 'SecurityError';
  }
}

export class ConflictError extends DatasetVersioningError {
  constructor(message: string, options: ErrorOptions = {}) {
    super('conflict', message, options);
    this.name = 'ConflictError';
  }
}

export class ValidationError extends DatasetVersioningError {
  constructor(message: string, options: ErrorOptions = {}) {
    super('validation', message, options);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends DatasetVersioningError {
  constructor(message: string, options: ErrorOptions = {}) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * An external command exited with a non-zero status.
 */
export class CommandFailedError extends DatasetVersioningError {
  public readonly command: string;
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string, options: ErrorOptions = {}) {
    const detail = stderr.trim().split('\n').filter((line) => line.trim().length > 0).pop();
    super(
      'command',
      `Command '${command}' exited with code ${exitCode ?? 'null'}${detail ? `: ${detail.trim()}` : ''}`,
      options
    );
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class CircuitOpenError extends DatasetVersioningError {
  public readonly circuit: string;

  constructor(circuit: string, options: ErrorOptions = {}) {
    super('circuit_open', `Circuit breaker '${circuit}' is open`, options);
    this.name = 'CircuitOpenError';
    this.circuit = circuit;
  }
}

/**
 * Thrown once a retry executor has used up its attempts. The kind mirrors the
 * last observed failure, which is kept as the cause.
 */
export class RetriesExhaustedError extends DatasetVersioningError {
  public readonly attempts: number;
  public readonly lastError: DatasetVersioningError;

  constructor(operation: string, attempts: number, lastError: DatasetVersioningError) {
    super(lastError.kind, `${operation} failed after ${attempts} attempts: ${lastError.message}`, {
      operation,
      statusCode: lastError.statusCode,
      cause: lastError,
    });
    this.name = 'RetriesExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Surface error of an orchestrator operation.
 */
export class DatasetOperationError extends DatasetVersioningError {
  public readonly subject: string;

  constructor(operation: string, subject: string, cause: unknown) {
    const root = toDatasetError(cause, operation);
    super(root.kind, `${operation} failed for ${subject}: ${root.message}`, {
      operation,
      statusCode: root.statusCode,
      cause,
    });
    this.name = 'DatasetOperationError';
    this.subject = subject;
  }
}

const CODE_KINDS: Record<string, TransientKind> = {
  ECONNREFUSED: 'connection',
  ECONNRESET: 'connection',
  ENOTFOUND: 'connection',
  EAI_AGAIN: 'connection',
  EHOSTUNREACH: 'connection',
  ENETUNREACH: 'connection',
  UND_ERR_SOCKET: 'connection',
  UND_ERR_CLOSED: 'connection',
  ETIMEDOUT: 'timeout',
  ESOCKETTIMEDOUT: 'timeout',
  UND_ERR_CONNECT_TIMEOUT: 'timeout',
  UND_ERR_HEADERS_TIMEOUT: 'timeout',
  UND_ERR_BODY_TIMEOUT: 'timeout',
  EPIPE: 'io',
  EIO: 'io',
  ECONNABORTED: 'io',
};

export function isTransientKind(kind: FailureKind): kind is TransientKind {
  return kind === 'connection' || kind === 'timeout' || kind === 'io';
}

/**
 * Reads the `code` property Node and undici attach to system errors.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Maps an arbitrary thrown value to a failure kind. Returns `undefined` for
 * values that carry no recognizable failure category.
 */
export function classifyError(error: unknown): FailureKind | undefined {
  if (error instanceof DatasetVersioningError) return error.kind;
  const code = errorCode(error);
  if (code !== undefined && code in CODE_KINDS) return CODE_KINDS[code];
  if (error instanceof Error && error.cause !== undefined && error.cause !== error) {
    return classifyError(error.cause);
  }
  return undefined;
}

/**
 * Normalizes a thrown value into a {@link DatasetVersioningError}.
 */
export function toDatasetError(error: unknown, operation?: string): DatasetVersioningError {
  if (error instanceof DatasetVersioningError) return error;
  const kind = classifyError(error);
  if (kind !== undefined && isTransientKind(kind)) {
    return new TransientError(kind, errorMessage(error), { operation, cause: error });
  }
  return new DatasetVersioningError('internal', errorMessage(error), { operation, cause: error });
}

/**
 * Replaces `user:secret@` authorities in URLs with `***@`.
 */
export function redactUrlCredentials(text: string): string {
  return text.replace(/([a-z][a-z0-9+.-]*:\/\/)[^/\s@]+@/gi, '$1***@');
}

export type Result<T, E = DatasetVersioningError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Runs a best-effort step and captures its outcome instead of throwing.
 */
export async function settle<T>(operation: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    return { ok: false, error: toDatasetError(error) };
  }
}
