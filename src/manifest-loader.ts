/**
 * File and buffer entry points around `parseManifest`.
 */
import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { ManifestLoadError } from './errors.js';
import { parseManifest } from './manifest-parser.js';
import type { Manifest } from './types/manifest.js';
import type { ParseOptions } from './types/warnings.js';

function loadError(filePath: string, error: unknown): ManifestLoadError {
  return new ManifestLoadError(`Failed to read manifest "${filePath}": ${error instanceof Error ? error.message : String(error)}`, filePath, error);
}

/**
 * Manifest loading utilities. All three entry points decode through the same pure parser,
 * so the same bytes always give structurally equal results.
 */
export class ManifestLoader {
  /** Error class for I/O failures. Parse failures surface as `ManifestParseError`. */
  static readonly Error: typeof ManifestLoadError = ManifestLoadError;

  /**
   * Reads a manifest file asynchronously and decodes it.
   *
   * @throws {ManifestLoadError} If the file cannot be read
   * @throws {ManifestParseError} If the contents are not a manifest
   */
  static async read({ filePath, options }: { readonly filePath: string; readonly options?: ParseOptions }): Promise<Manifest> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw loadError(filePath, error);
    }
    return parseManifest(buffer, options);
  }

  /**
   * Synchronous counterpart of `read`.
   */
  static readSync({ filePath, options }: { readonly filePath: string; readonly options?: ParseOptions }): Manifest {
    let buffer: Buffer;
    try {
      buffer = readFileSync(filePath);
    } catch (error) {
      throw loadError(filePath, error);
    }
    return parseManifest(buffer, options);
  }

  /**
   * Decodes bytes already in memory.
   */
  static fromBuffer({ buffer, options }: { readonly buffer: Uint8Array; readonly options?: ParseOptions }): Manifest {
    return parseManifest(buffer, options);
  }
}

export function parseManifestSync(filePath: string, options?: ParseOptions): Manifest {
  return ManifestLoader.readSync({ filePath, options });
}

export function parseManifestAsync(filePath: string, options?: ParseOptions): Promise<Manifest> {
  return ManifestLoader.read({ filePath, options });
}

export function parseManifestBuffer(buffer: Uint8Array, options?: ParseOptions): Manifest {
  return ManifestLoader.fromBuffer({ buffer, options });
}
