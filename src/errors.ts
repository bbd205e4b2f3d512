/**
 * Typed errors raised by the exporter. Each carries a `kind` discriminator so
 * callers can branch without `instanceof` chains.
 */

export type ErrorKind = 'DISCOVERY' | 'TRANSPORT' | 'CONFIG';

export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/** The wiki's script path could not be determined from the seed page. Fatal. */
export class DiscoveryError extends Error implements TypedError {
  readonly kind = 'DISCOVERY' as const;

  constructor(message: string) {
    super(message);
    this.name = 'DiscoveryError';
    Object.setPrototypeOf(this, DiscoveryError.prototype);
  }
}

/** A request or response failed while listing or exporting. */
export class TransportError extends Error implements TypedError {
  readonly kind = 'TRANSPORT' as const;
  readonly request: string;
  readonly statusCode?: number;

  constructor(request: string, cause: unknown, statusCode?: number) {
    super(`${request}: ${describeError(cause)}`, { cause });
    this.name = 'TransportError';
    this.request = request;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/** Invalid command line or environment value. */
export class ConfigError extends Error implements TypedError {
  readonly kind = 'CONFIG' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function isTypedError(err: unknown): err is TypedError {
  return err instanceof Error && 'kind' in err && typeof err.kind === 'string';
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
