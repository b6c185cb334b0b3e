export type ReleaseErrorCode =
  | 'INVALID_VERSION'
  | 'VERSION_NOT_ADVANCED'
  | 'MISSING_METADATA'
  | 'STYLE_VIOLATION'
  | 'MISSING_PARAMETERS'
  | 'FORGE_REQUEST_FAILED'
  | 'PR_EXISTS'
  | 'PR_CREATE_FAILED'
  | 'MERGE_FAILED'
  | 'PUBLISH_FAILED';

export interface ReleaseErrorDetails {
  status?: number;
  body?: string;
  stdout?: string;
  stderr?: string;
  [key: string]: unknown;
}

export class ReleaseError extends Error {
  constructor(
    public readonly code: ReleaseErrorCode,
    message: string,
    public readonly details: ReleaseErrorDetails = {}
  ) {
    super(message);
    this.name = 'ReleaseError';
  }

  /**
   * Same failure, reported under a different code. Used where a step
   * reclassifies a generic transport failure (e.g. PR creation).
   */
  withCode(code: ReleaseErrorCode): ReleaseError {
    return new ReleaseError(code, this.message, this.details);
  }
}

export class ConfigurationError extends Error {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ReleaseError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  code: ReleaseErrorCode,
  message: string,
  details?: ReleaseErrorDetails
): Result<T> {
  return { ok: false, error: new ReleaseError(code, message, details) };
}
