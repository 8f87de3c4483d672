/**
 * Error taxonomy for cuemark.
 *
 * Parsing and registration problems are raised synchronously at the call
 * site. Errors thrown by tag handlers are never wrapped: they propagate as-is,
 * or land in a failed ExecutionRecord when a whole text is executed.
 */

export type CuemarkErrorCode =
  | 'PARSE_ERROR'
  | 'REGISTRATION_ERROR'
  | 'AUTHORIZATION_ERROR'
  | 'LOOKUP_ERROR'
  | 'PARAMETER_SMUGGLING';

export class CuemarkError extends Error {
  readonly code: CuemarkErrorCode;

  constructor(code: CuemarkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CuemarkError';
    this.code = code;
  }
}

/** Malformed markup. Always fails closed. */
export class ParseError extends CuemarkError {
  /** Source offset the failure was detected at, when known. */
  readonly offset?: number;

  constructor(message: string, offset?: number) {
    super('PARSE_ERROR', message);
    this.name = 'ParseError';
    this.offset = offset;
  }
}

export class RegistrationError extends CuemarkError {
  constructor(message: string) {
    super('REGISTRATION_ERROR', message);
    this.name = 'RegistrationError';
  }
}

export class AuthorizationError extends CuemarkError {
  constructor(message: string) {
    super('AUTHORIZATION_ERROR', message);
    this.name = 'AuthorizationError';
  }
}

/** No handler could be resolved for a tag or namespace. */
export class LookupError extends CuemarkError {
  constructor(message: string) {
    super('LOOKUP_ERROR', message);
    this.name = 'LookupError';
  }
}

/**
 * The same key was supplied both by the tag's attributes and by the caller's
 * keyword arguments.
 */
export class ParameterSmugglingError extends CuemarkError {
  readonly keys: readonly string[];

  constructor(keys: readonly string[], raw: string) {
    super(
      'PARAMETER_SMUGGLING',
      `Parameter smuggling rejected for ${raw}: ${keys.map((k) => `'${k}'`).join(', ')} supplied by both tag and caller`
    );
    this.name = 'ParameterSmugglingError';
    this.keys = keys;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
