/**
 * Builds binary manifests in memory for tests.
 */
import { createHash } from 'node:crypto';
import { deflateSync } from 'node:zlib';
import { HEADER_SIZE, LEGACY_HEADER_SIZE, MANIFEST_MAGIC, STORED_COMPRESSED } from '../../src/constants/manifest-format.js';

export interface MetaFixture {
  readonly dataVersion?: number;
  readonly featureLevel?: number;
  readonly isFileData?: boolean;
  readonly appId?: number;
  readonly appName?: string;
  readonly buildVersion?: string;
  readonly launchExe?: string;
  readonly launchCommand?: string;
  readonly prereqIds?: readonly string[];
  readonly prereqName?: string;
  readonly prereqPath?: string;
  readonly prereqArgs?: string;
  readonly buildId?: string;
  readonly uninstallActionPath?: string;
  readonly uninstallActionArgs?: string;
  /** Extra bytes appended inside the section, as a newer writer would. */
  readonly trailing?: Buffer;
}

export interface ChunkFixture {
  readonly guid: string;
  readonly hash?: bigint;
  readonly sha?: string;
  readonly group?: number;
  readonly windowSize?: number;
  readonly fileSize?: bigint;
}

export interface PartFixture {
  readonly guid: string;
  readonly offset?: number;
  readonly size: number;
}

export interface FileFixture {
  readonly filename: string;
  readonly symlinkTarget?: string;
  readonly sha?: string;
  readonly flags?: number;
  readonly tags?: readonly string[];
  readonly parts: readonly PartFixture[];
  readonly md5?: string;
  readonly mimeType?: string;
  readonly sha256?: string;
}

export interface ManifestFixture {
  readonly meta?: MetaFixture;
  readonly chunks?: readonly ChunkFixture[];
  readonly chunkListVersion?: number;
  readonly files?: readonly FileFixture[];
  readonly fileListVersion?: number;
  readonly compress?: boolean;
  readonly headerVersion?: number;
  readonly legacyHeader?: boolean;
  /** Hex SHA-1 to store instead of the real payload hash. */
  readonly sha1Override?: string;
  readonly storedAs?: number;
}

export const ZERO_SHA1 = '0'.repeat(40);

/**
 * Growable little-endian byte writer.
 */
export class ManifestWriter {
  private buffer: Buffer;
  private offset: number;

  constructor() {
    this.buffer = Buffer.alloc(256);
    this.offset = 0;
  }

  get length(): number {
    return this.offset;
  }

  uint8(value: number): this {
    this.ensureCapacity(1);
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
    return this;
  }

  uint32(value: number): this {
    this.ensureCapacity(4);
    this.buffer.writeUInt32LE(value >>> 0, this.offset);
    this.offset += 4;
    return this;
  }

  int32(value: number): this {
    this.ensureCapacity(4);
    this.buffer.writeInt32LE(value, this.offset);
    this.offset += 4;
    return this;
  }

  uint64(value: bigint): this {
    this.ensureCapacity(8);
    this.buffer.writeBigUInt64LE(value, this.offset);
    this.offset += 8;
    return this;
  }

  bytes(data: Uint8Array): this {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.offset);
    this.offset += data.length;
    return this;
  }

  hex(value: string): this {
    return this.bytes(Buffer.from(value, 'hex'));
  }

  /**
   * UTF-8 string with a NUL terminator counted in the length, as the format's writer does.
   */
  fstring(value: string): this {
    if (value.length === 0) {
      return this.int32(0);
    }
    const encoded = Buffer.from(`${value}\0`, 'utf8');
    this.int32(encoded.length);
    return this.bytes(encoded);
  }

  /**
   * UTF-16LE string, signalled by a negative length in code units (terminator included).
   */
  fstringUtf16(value: string): this {
    const encoded = Buffer.from(`${value}\0`, 'utf16le');
    this.int32(-(encoded.length / 2));
    return this.bytes(encoded);
  }

  fstringArray(values: readonly string[]): this {
    this.uint32(values.length);
    for (const value of values) {
      this.fstring(value);
    }
    return this;
  }

  /**
   * Writes a canonical GUID string as four little-endian u32 words.
   */
  guid(value: string): this {
    const hex = value.replace(/-/g, '');
    for (let i = 0; i < 32; i += 8) {
      this.uint32(Number.parseInt(hex.slice(i, i + 8), 16));
    }
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.offset));
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer);
      this.buffer = newBuffer;
    }
  }
}

/**
 * Prefixes a section body (starting with its version byte) with its total size.
 */
export function frameSection(body: Buffer): Buffer {
  return new ManifestWriter().uint32(body.length + 4).bytes(body).toBuffer();
}

export function buildMetaSection(meta: MetaFixture = {}): Buffer {
  const version = meta.dataVersion ?? 1;
  const writer = new ManifestWriter()
    .uint8(version)
    .int32(meta.featureLevel ?? 18)
    .uint8(meta.isFileData === true ? 1 : 0)
    .int32(meta.appId ?? 0)
    .fstring(meta.appName ?? '')
    .fstring(meta.buildVersion ?? '')
    .fstring(meta.launchExe ?? '')
    .fstring(meta.launchCommand ?? '')
    .fstringArray(meta.prereqIds ?? [])
    .fstring(meta.prereqName ?? '')
    .fstring(meta.prereqPath ?? '')
    .fstring(meta.prereqArgs ?? '');
  if (version >= 1) {
    writer.fstring(meta.buildId ?? '');
  }
  if (version >= 2) {
    writer.fstring(meta.uninstallActionPath ?? '').fstring(meta.uninstallActionArgs ?? '');
  }
  if (meta.trailing) {
    writer.bytes(meta.trailing);
  }
  return frameSection(writer.toBuffer());
}

export function buildChunkListSection(chunks: readonly ChunkFixture[], dataVersion: number = 3): Buffer {
  const writer = new ManifestWriter().uint8(dataVersion).uint32(chunks.length);
  chunks.forEach((chunk) => writer.guid(chunk.guid));
  chunks.forEach((chunk) => writer.uint64(chunk.hash ?? 0n));
  chunks.forEach((chunk) => writer.hex(chunk.sha ?? ZERO_SHA1));
  chunks.forEach((chunk) => writer.uint8(chunk.group ?? 0));
  chunks.forEach((chunk) => writer.uint32(chunk.windowSize ?? 1048576));
  chunks.forEach((chunk) => writer.uint64(chunk.fileSize ?? 0n));
  return frameSection(writer.toBuffer());
}

export function buildFileListSection(files: readonly FileFixture[], dataVersion: number = 0): Buffer {
  const writer = new ManifestWriter().uint8(dataVersion).uint32(files.length);
  files.forEach((file) => writer.fstring(file.filename));
  files.forEach((file) => writer.fstring(file.symlinkTarget ?? ''));
  files.forEach((file) => writer.hex(file.sha ?? ZERO_SHA1));
  files.forEach((file) => writer.uint8(file.flags ?? 0));
  files.forEach((file) => writer.fstringArray(file.tags ?? []));
  files.forEach((file) => {
    writer.uint32(file.parts.length);
    for (const part of file.parts) {
      writer.uint32(28).guid(part.guid).uint32(part.offset ?? 0).uint32(part.size);
    }
  });
  if (dataVersion >= 2) {
    files.forEach((file) => {
      if (file.md5 === undefined) {
        writer.uint32(0);
      } else {
        writer.uint32(1).hex(file.md5);
      }
    });
    files.forEach((file) => writer.fstring(file.mimeType ?? ''));
    files.forEach((file) => writer.hex(file.sha256 ?? '0'.repeat(64)));
  }
  return frameSection(writer.toBuffer());
}

export function buildPayload(fixture: ManifestFixture): Buffer {
  return Buffer.concat([
    buildMetaSection(fixture.meta),
    buildChunkListSection(fixture.chunks ?? [], fixture.chunkListVersion),
    buildFileListSection(fixture.files ?? [], fixture.fileListVersion)
  ]);
}

export function sha1(data: Uint8Array): string {
  return createHash('sha1').update(data).digest('hex');
}

/**
 * Wraps a payload in the container header, compressing it when asked.
 */
export interface WrapOptions extends Pick<ManifestFixture, 'compress' | 'headerVersion' | 'legacyHeader' | 'sha1Override' | 'storedAs'> {
  /** Bytes written after the header in place of the (deflated) payload. */
  readonly stored?: Buffer;
  /** `dataSizeUncompressed` to declare instead of the payload length. */
  readonly declaredSize?: number;
}

export function wrapPayload(payload: Buffer, fixture: WrapOptions = {}): Buffer {
  const stored = fixture.stored ?? (fixture.compress === true ? deflateSync(payload) : payload);
  const headerSize = fixture.legacyHeader === true ? LEGACY_HEADER_SIZE : HEADER_SIZE;
  const writer = new ManifestWriter()
    .uint32(MANIFEST_MAGIC)
    .int32(headerSize)
    .int32(fixture.declaredSize ?? payload.length)
    .int32(stored.length)
    .hex(fixture.sha1Override ?? sha1(payload))
    .uint8(fixture.storedAs ?? (fixture.compress === true ? STORED_COMPRESSED : 0));
  if (fixture.legacyHeader !== true) {
    writer.int32(fixture.headerVersion ?? 18);
  }
  return Buffer.concat([writer.toBuffer(), stored]);
}

export function buildManifest(fixture: ManifestFixture = {}): Buffer {
  return wrapPayload(buildPayload(fixture), fixture);
}
