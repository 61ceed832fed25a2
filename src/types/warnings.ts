/**
 * Non-fatal conditions recorded while decoding.
 */

export type ManifestWarningCode =
  | 'PAYLOAD_TRUNCATED'
  | 'ENCRYPTED_PAYLOAD'
  | 'INFLATE_FAILED'
  | 'PAYLOAD_SHORTFALL'
  | 'PAYLOAD_OVERRUN'
  | 'STREAM_OFFSET'
  | 'SHA1_MISMATCH'
  | 'SECTION_INVALID'
  | 'SECTION_TRUNCATED'
  | 'DUPLICATE_CHUNK_GUID'
  | 'UNRESOLVED_CHUNK_PART'
  | 'JSON_FIELD_INVALID';

export type ManifestSection = 'header' | 'payload' | 'meta' | 'chunkList' | 'fileList' | 'json';

export interface ManifestWarning {
  readonly code: ManifestWarningCode;
  readonly message: string;
  readonly section?: ManifestSection;
}

/**
 * Sink for log output. `console` fits.
 */
export interface ManifestLogger {
  debug(message: string): void;
  warn(message: string): void;
}

export interface ParseOptions {
  /** Throw on SHA-1 mismatch or decompression shortfall instead of only warning. */
  readonly strict?: boolean;
  readonly logger?: ManifestLogger;
}

/**
 * Collects warnings for one parse call and forwards them to the logger.
 */
export class WarningCollector {
  private readonly items: ManifestWarning[] = [];

  constructor(private readonly logger?: ManifestLogger) {}

  add(code: ManifestWarningCode, message: string, section?: ManifestSection): void {
    this.items.push(section === undefined ? { code, message } : { code, message, section });
    this.logger?.warn(`${code}: ${message}`);
  }

  debug(message: string): void {
    this.logger?.debug(message);
  }

  has(code: ManifestWarningCode): boolean {
    return this.items.some((item: ManifestWarning) => item.code === code);
  }

  toArray(): ManifestWarning[] {
    return [...this.items];
  }
}
