import { logger } from './logger.js';

export type ErrorCategory = 'network' | 'protocol' | 'not-found' | 'validation' | 'config' | 'input';

/**
 * Base class for every failure the validator reports on purpose.
 * Anything else reaching the engine is treated as unexpected.
 */
export abstract class DnssecError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type NetworkErrorKind = 'timeout' | 'unreachable' | 'deadline';

export class NetworkError extends DnssecError {
  readonly category = 'network';

  constructor(
    readonly kind: NetworkErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  /** Only a lost or slow answer is worth asking again */
  get retryable(): boolean {
    return this.kind === 'timeout';
  }
}

export class DeadlineExceededError extends NetworkError {
  constructor(message = 'Validation deadline exceeded') {
    super('deadline', message);
  }
}

export type ProtocolErrorKind = 'servfail' | 'refused' | 'malformed';

export class ProtocolError extends DnssecError {
  readonly category = 'protocol';

  constructor(
    readonly kind: ProtocolErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type NotFoundKind = 'nxdomain' | 'nodata';

export class NotFoundError extends DnssecError {
  readonly category = 'not-found';

  /**
   * @param authority owner of the SOA record in the authority section, when the
   * response carried one. It names the zone that answered.
   */
  constructor(
    readonly kind: NotFoundKind,
    message: string,
    readonly authority?: string,
  ) {
    super(message);
  }
}

export class ValidationError extends DnssecError {
  readonly category = 'validation';
}

export class ConfigError extends DnssecError {
  readonly category = 'config';
}

export class InvalidDomainError extends DnssecError {
  readonly category = 'input';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

const isProduction = process.env.NODE_ENV === 'production';

/**
 * Message safe to hand back to a caller.
 * Known failures keep their text; unexpected ones are hidden in production.
 */
export function sanitizeErrorMessage(error: unknown, defaultMessage: string = 'An error occurred'): string {
  if (error instanceof DnssecError) {
    return error.message;
  }
  if (isProduction) {
    return defaultMessage;
  }
  return toError(error).message;
}

export function logError(error: unknown, context?: Record<string, unknown>): void {
  const err = toError(error);
  logger.error('Validation error', {
    ...context,
    error: err,
    errorStack: isProduction ? undefined : err.stack,
  });
}
