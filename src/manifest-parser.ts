/**
 * Manifest decoding entry point.
 *
 * Routes the buffer to the binary or the JSON decoder once, by the header magic, and assembles
 * one `Manifest`. Pure and synchronous: no I/O, no shared state between calls.
 */
import { readChunkDataList } from './chunk-list.js';
import { LEGACY_HEADER_SIZE } from './constants/manifest-format.js';
import { ManifestParseError } from './errors.js';
import { readFileManifestList } from './file-list.js';
import { readManifestHeader } from './header.js';
import type { HeaderReadResult } from './header.js';
import { readJsonManifest } from './json-manifest.js';
import { readManifestMeta } from './meta.js';
import { preparePayload } from './payload.js';
import type { PayloadStage } from './payload.js';
import type { ChunkDataList, Manifest, ManifestHeader } from './types/manifest.js';
import { WarningCollector } from './types/warnings.js';
import type { ParseOptions } from './types/warnings.js';
import { ByteCursor } from './utils/byte-cursor.js';

type BinaryHeader = Extract<HeaderReadResult, { kind: 'binary' }>;

function decodeBinary(bytes: Uint8Array, located: BinaryHeader, options: ParseOptions, warnings: WarningCollector): Manifest {
  const header: ManifestHeader = located.header;
  warnings.debug(`Binary manifest v${header.version}: payload [${located.payloadStart}, ${located.payloadEnd}), storedAs ${header.storedAs}`);

  const stage: PayloadStage = preparePayload({ bytes, ...located }, warnings);
  if (options.strict === true && !(stage.integrity.sha1Matches && stage.integrity.complete)) {
    throw new ManifestParseError(
      'INTEGRITY_MISMATCH',
      `Payload integrity check failed: sha1 ${stage.integrity.actualSha1 || '(none)'} vs ${header.sha1Hash}, ${stage.integrity.actualSize} of ${stage.integrity.expectedSize} bytes`
    );
  }

  if (!stage.decodable) {
    return { format: 'binary', header, integrity: stage.integrity, warnings: warnings.toArray() };
  }

  // Sections follow each other in fixed order; each reader leaves the cursor at its section's end.
  const cursor = new ByteCursor(stage.payload);
  const meta = readManifestMeta(cursor, warnings);
  const chunkList: ChunkDataList | undefined = readChunkDataList(cursor, warnings);
  const fileList = readFileManifestList(cursor, chunkList, warnings);

  return {
    format: 'binary',
    header,
    ...(meta !== undefined ? { meta } : {}),
    ...(chunkList !== undefined ? { chunkList } : {}),
    ...(fileList !== undefined ? { fileList } : {}),
    integrity: stage.integrity,
    warnings: warnings.toArray()
  };
}

/**
 * Decodes a manifest held in memory.
 *
 * Truncated or corrupted binary manifests still produce a result; what went wrong is listed in
 * `warnings`. Only input that is neither a binary manifest nor a JSON document fails.
 *
 * @throws {ManifestParseError} EMPTY_INPUT, TRUNCATED_HEADER, INVALID_JSON, or INTEGRITY_MISMATCH in strict mode
 */
export function parseManifest(bytes: Uint8Array, options: ParseOptions = {}): Manifest {
  if (bytes.length === 0) {
    throw new ManifestParseError('EMPTY_INPUT', 'Manifest buffer is empty');
  }

  const warnings = new WarningCollector(options.logger);
  const located: HeaderReadResult = readManifestHeader(bytes);
  switch (located.kind) {
    case 'binary':
      return decodeBinary(bytes, located, options, warnings);
    case 'truncated':
      throw new ManifestParseError('TRUNCATED_HEADER', `Binary manifest header needs ${LEGACY_HEADER_SIZE} bytes, got ${located.available}`);
    case 'not-binary': {
      warnings.debug('No binary manifest magic, decoding as JSON');
      const manifest = readJsonManifest(bytes, warnings);
      return { ...manifest, warnings: warnings.toArray() };
    }
  }
}
