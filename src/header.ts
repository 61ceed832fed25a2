/**
 * Container header decoding and format detection.
 */
import { LEGACY_HEADER_SIZE, MANIFEST_MAGIC, SHA1_BYTES, STORED_COMPRESSED, STORED_ENCRYPTED } from './constants/manifest-format.js';
import type { ManifestFormat, ManifestHeader } from './types/manifest.js';
import { ByteCursor } from './utils/byte-cursor.js';
import type { ReadResult } from './utils/byte-cursor.js';

export type HeaderReadResult =
  | { readonly kind: 'not-binary' }
  | { readonly kind: 'truncated'; readonly available: number }
  | {
      readonly kind: 'binary';
      readonly header: ManifestHeader;
      readonly payloadStart: number;
      readonly payloadEnd: number;
      /** Declared payload length ran past the end of the buffer. */
      readonly payloadTruncated: boolean;
    };

function hasMagic(bytes: Uint8Array): boolean {
  const cursor = new ByteCursor(bytes);
  const magic: ReadResult<number> = cursor.u32();
  return magic.status === 'ok' && magic.value === MANIFEST_MAGIC;
}

/**
 * Decides which decoder handles the buffer. Anything without the binary magic is treated as JSON.
 */
export function detectManifestFormat(bytes: Uint8Array): ManifestFormat {
  return hasMagic(bytes) ? 'binary' : 'json';
}

export function isCompressedPayload(header: ManifestHeader): boolean {
  return (header.storedAs & STORED_COMPRESSED) !== 0;
}

export function isEncryptedPayload(header: ManifestHeader): boolean {
  return (header.storedAs & STORED_ENCRYPTED) !== 0;
}

/**
 * Reads the fixed header at offset 0 and works out where the payload lives.
 * The container version is only stored when `headerSize` exceeds the legacy 37 bytes.
 */
export function readManifestHeader(bytes: Uint8Array): HeaderReadResult {
  if (!hasMagic(bytes)) {
    return { kind: 'not-binary' };
  }
  if (bytes.length < LEGACY_HEADER_SIZE) {
    return { kind: 'truncated', available: bytes.length };
  }

  const cursor = new ByteCursor(bytes, 4);
  const headerSize: number = value(cursor.i32());
  const dataSizeUncompressed: number = value(cursor.i32());
  const dataSizeCompressed: number = value(cursor.i32());
  const sha1Hash: string = value(cursor.hex(SHA1_BYTES));
  const storedAs: number = value(cursor.u8());

  let version = 0;
  if (headerSize > LEGACY_HEADER_SIZE) {
    const stored: ReadResult<number> = cursor.i32();
    version = stored.status === 'ok' ? stored.value : 0;
  }

  const header: ManifestHeader = {
    headerSize,
    dataSizeUncompressed,
    dataSizeCompressed,
    sha1Hash,
    storedAs,
    version,
    guid: '',
    rollingHash: 0,
    hashType: 0
  };

  // A header smaller than the fields just read cannot overlap them.
  const payloadStart: number = Math.min(bytes.length, Math.max(headerSize, cursor.offset));
  const declaredSize: number = Math.max(0, isCompressedPayload(header) ? dataSizeCompressed : dataSizeUncompressed);
  const declaredEnd: number = payloadStart + declaredSize;
  const payloadEnd: number = Math.min(declaredEnd, bytes.length);

  return { kind: 'binary', header, payloadStart, payloadEnd, payloadTruncated: declaredEnd > bytes.length };
}

/**
 * Unwraps reads that the up-front length check already guarantees.
 */
function value<T>(result: ReadResult<T>): T {
  if (result.status !== 'ok') {
    throw new Error(`Header field read past the ${LEGACY_HEADER_SIZE}-byte header`);
  }
  return result.value;
}
