/**
 * File list decoding and chunk part resolution.
 */
import { CHUNK_PART_SIZE, FILE_META_COMPRESSED, FILE_META_READ_ONLY, FILE_META_UNIX_EXECUTABLE, MD5_BYTES, SHA1_BYTES, SHA256_BYTES } from './constants/manifest-format.js';
import type { ChunkDataList, ChunkPart, FileManifest, FileManifestList } from './types/manifest.js';
import type { WarningCollector } from './types/warnings.js';
import type { ByteCursor, ReadResult } from './utils/byte-cursor.js';
import { ok } from './utils/byte-cursor.js';
import { mimeTypeForFilename } from './utils/mime-type.js';
import { closeSection, openSection } from './utils/section.js';
import type { SectionFrame } from './utils/section.js';

/** File list data version that appends MD5, MIME type and SHA-256 columns. */
const FILE_LIST_HASHES_VERSION = 2;

/**
 * A chunk part before it is matched against the catalog.
 */
export interface RawChunkPart {
  readonly dataSize: number;
  readonly parentGuid: string;
  readonly offset: number;
  readonly size: number;
}

/**
 * File fields as decoded from the wire, before resolution and derived values.
 */
export interface RawFileManifest {
  filename: string;
  symlinkTarget: string;
  shaHash: string;
  fileMetaFlags: number;
  installTags: readonly string[];
  chunkParts: readonly RawChunkPart[];
  mimeType?: string;
  md5Hash?: string;
  sha256Hash?: string;
}

export function isReadOnly(file: FileManifest): boolean {
  return (file.fileMetaFlags & FILE_META_READ_ONLY) !== 0;
}

export function isCompressed(file: FileManifest): boolean {
  return (file.fileMetaFlags & FILE_META_COMPRESSED) !== 0;
}

export function isUnixExecutable(file: FileManifest): boolean {
  return (file.fileMetaFlags & FILE_META_UNIX_EXECUTABLE) !== 0;
}

/**
 * Links a part to its catalog entry. The chunk is shared with the catalog, never copied.
 */
function resolveChunkPart(part: RawChunkPart, chunkList: ChunkDataList | undefined): ChunkPart {
  const index: number | undefined = chunkList?.chunkLookup.get(part.parentGuid.toLowerCase());
  if (chunkList === undefined || index === undefined) {
    return { ...part };
  }
  return { ...part, chunkIndex: index, chunk: chunkList.elements[index] };
}

/**
 * Resolves chunk parts and fills in the derived `fileSize` and `mimeType`.
 * Unresolved parts are kept so their byte ranges stay usable.
 */
export function finalizeFileManifest(raw: RawFileManifest, chunkList: ChunkDataList | undefined, warnings: WarningCollector): FileManifest {
  const chunkParts: ChunkPart[] = raw.chunkParts.map((part: RawChunkPart) => resolveChunkPart(part, chunkList));
  const unresolved: number = chunkParts.filter((part: ChunkPart) => part.chunk === undefined).length;
  if (unresolved > 0) {
    warnings.add('UNRESOLVED_CHUNK_PART', `${raw.filename}: ${unresolved} of ${chunkParts.length} chunk parts reference unknown chunks`, 'fileList');
  }

  const fileSize: number = chunkParts.reduce((sum: number, part: ChunkPart) => sum + part.size, 0);
  const file: FileManifest = {
    filename: raw.filename,
    symlinkTarget: raw.symlinkTarget,
    shaHash: raw.shaHash,
    fileMetaFlags: raw.fileMetaFlags,
    installTags: raw.installTags,
    chunkParts,
    fileSize,
    mimeType: raw.mimeType !== undefined && raw.mimeType.length > 0 ? raw.mimeType : mimeTypeForFilename(raw.filename),
    hasUnresolvedChunkParts: unresolved > 0
  };
  return {
    ...file,
    ...(raw.md5Hash !== undefined ? { md5Hash: raw.md5Hash } : {}),
    ...(raw.sha256Hash !== undefined ? { sha256Hash: raw.sha256Hash } : {})
  };
}

function readChunkPart(cursor: ByteCursor): ReadResult<RawChunkPart> {
  const start: number = cursor.offset;
  const dataSize: ReadResult<number> = cursor.u32();
  const parentGuid: ReadResult<string> = dataSize.status === 'ok' ? cursor.guid() : dataSize;
  const offset: ReadResult<number> = parentGuid.status === 'ok' ? cursor.u32() : parentGuid;
  const size: ReadResult<number> = offset.status === 'ok' ? cursor.u32() : offset;
  if (dataSize.status !== 'ok' || parentGuid.status !== 'ok' || offset.status !== 'ok' || size.status !== 'ok') {
    cursor.seek(start);
    return { status: 'exhausted' };
  }
  // Newer writers may append fields to a part; its size says where the next one starts.
  if (dataSize.value > CHUNK_PART_SIZE) {
    cursor.seek(start + dataSize.value);
  }
  return ok({ dataSize: dataSize.value, parentGuid: parentGuid.value, offset: offset.value, size: size.value });
}

function readMd5(cursor: ByteCursor): ReadResult<string | undefined> {
  const present: ReadResult<number> = cursor.u32();
  if (present.status !== 'ok') {
    return present;
  }
  return present.value === 0 ? ok(undefined) : cursor.hex(MD5_BYTES);
}

/**
 * Fills one column of the column-major file table.
 * @returns false when the section ran out first
 */
function readColumn<T>(cursor: ByteCursor, files: RawFileManifest[], read: (cursor: ByteCursor) => ReadResult<T>, assign: (file: RawFileManifest, value: T) => void): boolean {
  for (const file of files) {
    const result: ReadResult<T> = read(cursor);
    if (result.status !== 'ok') {
      return false;
    }
    assign(file, result.value);
  }
  return true;
}

/**
 * Decodes the file list at the payload cursor and resolves every chunk part against `chunkList`.
 */
export function readFileManifestList(payload: ByteCursor, chunkList: ChunkDataList | undefined, warnings: WarningCollector): FileManifestList | undefined {
  const frame: SectionFrame | null = openSection(payload, 'fileList', warnings);
  if (frame === null) {
    return undefined;
  }
  const { cursor } = frame;

  const count: ReadResult<number> = cursor.u32();
  const declared: number = count.status === 'ok' ? count.value : 0;
  const files: RawFileManifest[] = [];

  for (let i = 0; i < declared; i++) {
    const filename: ReadResult<string> = cursor.fstring();
    if (filename.status !== 'ok') {
      break;
    }
    files.push({ filename: filename.value, symlinkTarget: '', shaHash: '', fileMetaFlags: 0, installTags: [], chunkParts: [] });
  }

  let complete: boolean = count.status === 'ok'
    && files.length === declared
    && readColumn(cursor, files, (c: ByteCursor) => c.fstring(), (file: RawFileManifest, target: string) => {
      file.symlinkTarget = target;
    })
    && readColumn(cursor, files, (c: ByteCursor) => c.hex(SHA1_BYTES), (file: RawFileManifest, sha: string) => {
      file.shaHash = sha;
    })
    && readColumn(cursor, files, (c: ByteCursor) => c.u8(), (file: RawFileManifest, flags: number) => {
      file.fileMetaFlags = flags;
    })
    && readColumn(cursor, files, (c: ByteCursor) => c.fstringArray(), (file: RawFileManifest, tags: string[]) => {
      file.installTags = tags;
    })
    && readColumn(cursor, files, (c: ByteCursor) => c.array(readChunkPart), (file: RawFileManifest, parts: RawChunkPart[]) => {
      file.chunkParts = parts;
    });

  if (complete && frame.dataVersion >= FILE_LIST_HASHES_VERSION) {
    complete = readColumn(cursor, files, readMd5, (file: RawFileManifest, md5: string | undefined) => {
      if (md5 !== undefined) {
        file.md5Hash = md5;
      }
    })
      && readColumn(cursor, files, (c: ByteCursor) => c.fstring(), (file: RawFileManifest, mimeType: string) => {
        file.mimeType = mimeType;
      })
      && readColumn(cursor, files, (c: ByteCursor) => c.hex(SHA256_BYTES), (file: RawFileManifest, sha256: string) => {
        file.sha256Hash = sha256;
      });
  }

  if (!complete) {
    warnings.add('SECTION_TRUNCATED', `File list decoded ${files.length} of ${declared} files, some fields missing`, 'fileList');
  }

  closeSection(payload, frame);
  return {
    dataSize: frame.dataSize,
    dataVersion: frame.dataVersion,
    count: declared,
    fileManifestList: files.map((file: RawFileManifest) => finalizeFileManifest(file, chunkList, warnings))
  };
}
