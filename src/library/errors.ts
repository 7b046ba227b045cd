export type ConfigErrorCode = 'MISSING_SECRET' | 'INVALID_SECRET';

export type AuthErrorCode =
  | 'WEAK_CREDENTIAL'
  | 'ALREADY_REGISTERED'
  | 'INVALID_CREDENTIALS'
  | 'EMAIL_NOT_CONFIRMED'
  | 'NOT_AUTHENTICATED'
  | 'UNAVAILABLE'
  | 'REJECTED';

export type DataErrorCode =
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'TRANSIENT'
  | 'INVALID_REQUEST'
  | 'REJECTED';

/**
 * Base class for every failure the organizer surfaces to its callers.
 * `code` discriminates the failure inside each subclass.
 */
export abstract class OrganizerError<Code extends string = string> extends Error {
  abstract readonly kind: 'config' | 'auth' | 'data' | 'validation';

  constructor(
    public readonly code: Code,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigError extends OrganizerError<ConfigErrorCode> {
  readonly kind = 'config' as const;

  constructor(code: ConfigErrorCode, message: string, public readonly keys: string[] = []) {
    super(code, message);
    this.name = 'ConfigError';
  }
}

export class AuthError extends OrganizerError<AuthErrorCode> {
  readonly kind = 'auth' as const;

  constructor(code: AuthErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'AuthError';
  }
}

export class DataError extends OrganizerError<DataErrorCode> {
  readonly kind = 'data' as const;

  constructor(
    code: DataErrorCode,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(code, message, options);
    this.name = 'DataError';
  }
}

export class ValidationError extends OrganizerError<'INVALID_INPUT'> {
  readonly kind = 'validation' as const;

  constructor(public readonly field: string, message: string) {
    super('INVALID_INPUT', message);
    this.name = 'ValidationError';
  }
}

export function isOrganizerError(error: unknown): error is OrganizerError {
  return error instanceof OrganizerError;
}
