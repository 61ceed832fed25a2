/**
 * Payload extraction: decompression and SHA-1 verification.
 * Neither a damaged stream nor a hash mismatch stops decoding; both become warnings.
 */
import { createHash } from 'node:crypto';
import { constants as zlibConstants, inflateSync } from 'node:zlib';
import { INFLATE_OVERRUN_SLACK, STORED_ZLIB_OFFSET, ZLIB_CMF, ZLIB_FLG_BYTES } from './constants/manifest-format.js';
import { isCompressedPayload, isEncryptedPayload } from './header.js';
import type { ManifestHeader, PayloadIntegrity } from './types/manifest.js';
import type { WarningCollector } from './types/warnings.js';

export interface PayloadStage {
  /** Decompressed section data, possibly shorter than declared. */
  readonly payload: Buffer;
  readonly integrity: PayloadIntegrity;
  /** False when the bytes cannot hold sections at all (an encrypted payload). */
  readonly decodable: boolean;
}

export interface PayloadInput {
  readonly bytes: Uint8Array;
  readonly header: ManifestHeader;
  readonly payloadStart: number;
  readonly payloadEnd: number;
  readonly payloadTruncated: boolean;
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function sha1Hex(data: Uint8Array): string {
  return createHash('sha1').update(data).digest('hex');
}

interface InflateOutcome {
  readonly output: Buffer;
  /** Why the whole stream would not inflate; `output` is then its longest inflatable prefix. */
  readonly failure?: Error;
}

function inflateOnce(compressed: Buffer, limit: number | undefined): Buffer | Error {
  try {
    return inflateSync(compressed, {
      finishFlush: zlibConstants.Z_SYNC_FLUSH,
      ...(limit !== undefined ? { maxOutputLength: limit } : {})
    });
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

/**
 * Inflates `compressed`, or failing that the longest prefix of it that inflates.
 * A damaged or oversized stream fails at one input position, so every shorter prefix succeeds.
 */
function inflatePrefix(compressed: Buffer, limit: number | undefined): InflateOutcome {
  const whole: Buffer | Error = inflateOnce(compressed, limit);
  if (!(whole instanceof Error)) {
    return { output: whole };
  }

  let output: Buffer = Buffer.alloc(0);
  let good = 0;
  let bad: number = compressed.length;
  while (bad - good > 1) {
    const middle: number = good + Math.floor((bad - good) / 2);
    const attempt: Buffer | Error = inflateOnce(compressed.subarray(0, middle), limit);
    if (attempt instanceof Error) {
      bad = middle;
    } else {
      good = middle;
      output = attempt;
    }
  }
  return { output, failure: whole };
}

function isZlibHeader(bytes: Buffer, offset: number): boolean {
  const flg: number | undefined = bytes[offset + 1];
  return bytes[offset] === ZLIB_CMF && flg !== undefined && ZLIB_FLG_BYTES.includes(flg);
}

/**
 * Looks past leading junk for a zlib header whose stream inflates cleanly to more than `atLeast` bytes.
 */
function findLaterStream(compressed: Buffer, limit: number | undefined, atLeast: number): { offset: number; output: Buffer } | undefined {
  for (let offset = 1; offset < compressed.length - 1; offset++) {
    if (isZlibHeader(compressed, offset)) {
      const attempt: Buffer | Error = inflateOnce(compressed.subarray(offset), limit);
      if (!(attempt instanceof Error) && attempt.length > atLeast) {
        return { offset, output: attempt };
      }
    }
  }
  return undefined;
}

/**
 * Inflates a zlib payload into at most `expectedSize` bytes.
 *
 * Output produced before a damaged byte is kept. A stream that inflates past `expectedSize`
 * is cut there. When the stream at offset 0 is unreadable, a later zlib header is tried.
 */
function inflatePayload(compressed: Buffer, expectedSize: number, warnings: WarningCollector): Buffer {
  if (compressed.length === 0) {
    return Buffer.alloc(0);
  }
  const limit: number | undefined = expectedSize > 0 ? expectedSize + INFLATE_OVERRUN_SLACK : undefined;
  const overruns = (output: Buffer): boolean => expectedSize > 0 && output.length > expectedSize;

  let { output, failure } = inflatePrefix(compressed, limit);
  if (failure !== undefined && !overruns(output)) {
    const later = findLaterStream(compressed, limit, output.length);
    if (later !== undefined) {
      warnings.add('STREAM_OFFSET', `zlib stream found at payload offset ${later.offset}, ${later.offset} leading bytes skipped`, 'payload');
      output = later.output;
      failure = undefined;
    }
  }

  if (overruns(output)) {
    warnings.add('PAYLOAD_OVERRUN', `Payload inflates past the declared ${expectedSize} bytes, excess dropped`, 'payload');
    output = output.subarray(0, expectedSize);
  } else if (failure !== undefined) {
    warnings.add('INFLATE_FAILED', `Payload decompression failed after ${output.length} bytes: ${failure.message}`, 'payload');
  }
  warnings.debug(`Inflated ${compressed.length} bytes into ${output.length} bytes`);
  return output;
}

/**
 * A payload flagged as stored may still hold a zlib stream behind a short prefix.
 */
function unwrapStoredPayload(raw: Buffer, warnings: WarningCollector): Buffer {
  if (!isZlibHeader(raw, STORED_ZLIB_OFFSET)) {
    return raw;
  }
  const inflated: Buffer | Error = inflateOnce(raw.subarray(STORED_ZLIB_OFFSET), undefined);
  if (inflated instanceof Error || inflated.length === 0) {
    return raw;
  }
  warnings.add('STREAM_OFFSET', `zlib stream found at payload offset ${STORED_ZLIB_OFFSET} of a stored payload, inflated to ${inflated.length} bytes`, 'payload');
  return inflated;
}

/**
 * Produces the section bytes for a binary manifest and the integrity verdict over them.
 */
export function preparePayload(input: PayloadInput, warnings: WarningCollector): PayloadStage {
  const { header } = input;
  const raw: Buffer = toBuffer(input.bytes).subarray(input.payloadStart, input.payloadEnd);
  const expectedSize: number = Math.max(0, header.dataSizeUncompressed);

  if (input.payloadTruncated) {
    warnings.add('PAYLOAD_TRUNCATED', `Payload declared past end of buffer, only ${raw.length} bytes available`, 'payload');
  }

  if (isEncryptedPayload(header)) {
    warnings.add('ENCRYPTED_PAYLOAD', 'Payload is encrypted and cannot be decoded', 'payload');
    return {
      payload: Buffer.alloc(0),
      integrity: { expectedSha1: header.sha1Hash, actualSha1: '', sha1Matches: false, expectedSize, actualSize: 0, complete: false },
      decodable: false
    };
  }

  const payload: Buffer = isCompressedPayload(header) ? inflatePayload(raw, expectedSize, warnings) : unwrapStoredPayload(raw, warnings);

  const complete: boolean = payload.length >= expectedSize;
  if (!complete) {
    warnings.add('PAYLOAD_SHORTFALL', `Recovered ${payload.length} of ${expectedSize} payload bytes`, 'payload');
  }

  const actualSha1: string = sha1Hex(payload);
  const sha1Matches: boolean = actualSha1 === header.sha1Hash.toLowerCase();
  if (!sha1Matches) {
    warnings.add('SHA1_MISMATCH', `Payload SHA-1 ${actualSha1} does not match header SHA-1 ${header.sha1Hash}`, 'payload');
  }

  return {
    payload,
    integrity: { expectedSha1: header.sha1Hash, actualSha1, sha1Matches, expectedSize, actualSize: payload.length, complete },
    decodable: true
  };
}
