/**
 * Fatal error types. Everything recoverable is a `ManifestWarning` instead.
 */

export type ManifestParseErrorCode = 'EMPTY_INPUT' | 'TRUNCATED_HEADER' | 'INVALID_JSON' | 'INTEGRITY_MISMATCH';

export class ManifestParseError extends Error {
  constructor(public readonly code: ManifestParseErrorCode, message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ManifestParseError';
  }
}

export class ManifestLoadError extends Error {
  constructor(message: string, public readonly filePath: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ManifestLoadError';
  }
}
