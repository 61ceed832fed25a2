/**
 * JSON manifest decoding.
 *
 * Older builds ship their manifest as a JSON document with PascalCase keys. Numbers in it are
 * "blob" strings: every byte written as three decimal digits, least significant byte first.
 */
import { z } from 'zod';
import { buildChunkLookup } from './chunk-list.js';
import { FILE_META_COMPRESSED, FILE_META_READ_ONLY, FILE_META_UNIX_EXECUTABLE } from './constants/manifest-format.js';
import { ManifestParseError } from './errors.js';
import { finalizeFileManifest } from './file-list.js';
import type { RawChunkPart, RawFileManifest } from './file-list.js';
import type { Chunk, ChunkDataList, FileManifest, Manifest, ManifestHeader, ManifestMeta } from './types/manifest.js';
import type { WarningCollector } from './types/warnings.js';
import { canonicalizeGuid } from './utils/guid.js';
import type { Draft } from './utils/section-fields.js';

const UINT32_MAX = 0xffffffffn;

const blobSchema = z.union([z.string().regex(/^(\d{3})*$/), z.number().int().nonnegative()]);
const guidMapSchema = z.record(z.string(), z.union([z.string(), z.number()]));

const documentSchema = z.record(z.string(), z.unknown());

const chunkPartSchema = z.object({
  Guid: z.string(),
  Offset: blobSchema,
  Size: blobSchema
});

const fileSchema = z.object({
  Filename: z.string(),
  FileHash: z.string().optional(),
  SymlinkTarget: z.string().optional(),
  bIsUnixExecutable: z.boolean().optional(),
  bIsReadOnly: z.boolean().optional(),
  bIsCompressed: z.boolean().optional(),
  InstallTags: z.array(z.string()).optional(),
  FileChunkParts: z.array(z.unknown()).optional()
});

type JsonDocument = z.infer<typeof documentSchema>;
type JsonFile = z.infer<typeof fileSchema>;
type GuidMap = z.infer<typeof guidMapSchema>;

/**
 * Decodes a blob string into its little-endian integer value.
 * Plain JSON numbers pass through.
 */
export function decodeBlob(value: string | number): bigint | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : undefined;
  }
  if (value.length % 3 !== 0 || !/^\d*$/.test(value)) {
    return undefined;
  }
  let result = 0n;
  for (let i = value.length - 3; i >= 0; i -= 3) {
    const byte: number = Number(value.slice(i, i + 3));
    if (byte > 0xff) {
      return undefined;
    }
    result = (result << 8n) | BigInt(byte);
  }
  return result;
}

/**
 * Decodes a blob string into its raw bytes, in stored order, as hex.
 */
function decodeBlobBytes(value: string): string | undefined {
  if (value.length % 3 !== 0 || !/^\d*$/.test(value)) {
    return undefined;
  }
  const bytes: number[] = [];
  for (let i = 0; i < value.length; i += 3) {
    const byte: number = Number(value.slice(i, i + 3));
    if (byte > 0xff) {
      return undefined;
    }
    bytes.push(byte);
  }
  return Buffer.from(bytes).toString('hex');
}

/**
 * Accepts either a 20-byte blob or a 40-character hex string.
 */
function decodeFileHash(value: string): string | undefined {
  if (/^[0-9a-fA-F]{40}$/.test(value)) {
    return value.toLowerCase();
  }
  const hex: string | undefined = decodeBlobBytes(value);
  return hex !== undefined && hex.length === 40 ? hex : undefined;
}

function toUint32(value: bigint): number {
  return Number(BigInt.asUintN(32, value));
}

class JsonFieldReader {
  constructor(private readonly document: JsonDocument, private readonly warnings: WarningCollector) {}

  /**
   * Reads `key` through `schema`. Missing keys and values of the wrong shape fall back to `fallback`.
   */
  take<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
    const raw: unknown = this.document[key];
    if (raw === undefined) {
      return fallback;
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      this.invalid(key, parsed.error.issues[0]?.message ?? 'unexpected value');
      return fallback;
    }
    return parsed.data;
  }

  blob(key: string): bigint {
    const raw: string | number = this.take(key, z.union([z.string(), z.number()]), 0);
    const decoded: bigint | undefined = decodeBlob(raw);
    if (decoded === undefined) {
      this.invalid(key, `"${String(raw)}" is not a numeric blob`);
      return 0n;
    }
    return decoded;
  }

  invalid(field: string, detail: string): void {
    this.warnings.add('JSON_FIELD_INVALID', `${field}: ${detail}`, 'json');
  }
}

/**
 * Catalog lookups keyed by canonical GUID, from the optional per-chunk maps.
 */
interface ChunkCatalogMaps {
  readonly hashes: GuidMap;
  readonly shas: GuidMap;
  readonly groups: GuidMap;
  readonly fileSizes: GuidMap;
}

function canonicalKeys(map: GuidMap): GuidMap {
  const result: GuidMap = {};
  for (const [key, value] of Object.entries(map)) {
    const guid: string | undefined = canonicalizeGuid(key);
    if (guid !== undefined) {
      result[guid] = value;
    }
  }
  return result;
}

function blobFrom(map: GuidMap, guid: string): bigint | undefined {
  const raw: string | number | undefined = map[guid];
  return raw === undefined ? undefined : decodeBlob(raw);
}

/**
 * Builds the chunk catalog from every distinct part GUID, in first-appearance order.
 */
function synthesizeChunkList(files: readonly RawFileManifest[], maps: ChunkCatalogMaps): ChunkDataList {
  const byGuid = new Map<string, Draft<Chunk>>();
  for (const file of files) {
    for (const part of file.chunkParts) {
      let chunk: Draft<Chunk> | undefined = byGuid.get(part.parentGuid);
      if (chunk === undefined) {
        chunk = { guid: part.parentGuid, hash: '', shaHash: '', group: 0, windowSize: 0, fileSize: '0' };
        byGuid.set(part.parentGuid, chunk);
      }
      chunk.windowSize = Math.max(chunk.windowSize, part.offset + part.size);
    }
  }

  for (const chunk of byGuid.values()) {
    const hash: bigint | undefined = blobFrom(maps.hashes, chunk.guid);
    if (hash !== undefined) {
      chunk.hash = BigInt.asUintN(64, hash).toString(16).padStart(16, '0');
    }
    const sha: string | number | undefined = maps.shas[chunk.guid];
    if (typeof sha === 'string' && /^[0-9a-fA-F]{40}$/.test(sha)) {
      chunk.shaHash = sha.toLowerCase();
    }
    const group: bigint | undefined = blobFrom(maps.groups, chunk.guid);
    if (group !== undefined) {
      chunk.group = Number(BigInt.asUintN(8, group));
    }
    const fileSize: bigint | undefined = blobFrom(maps.fileSizes, chunk.guid);
    chunk.fileSize = (fileSize ?? BigInt(chunk.windowSize)).toString();
  }

  const elements: readonly Chunk[] = Array.from(byGuid.values());
  return {
    dataSize: 0,
    dataVersion: 0,
    count: elements.length,
    elements,
    chunkLookup: buildChunkLookup(elements)
  };
}

function readChunkParts(file: JsonFile, reader: JsonFieldReader): RawChunkPart[] {
  const parts: RawChunkPart[] = [];
  (file.FileChunkParts ?? []).forEach((entry: unknown, index: number) => {
    const parsed = chunkPartSchema.safeParse(entry);
    const guid: string | undefined = parsed.success ? canonicalizeGuid(parsed.data.Guid) : undefined;
    const offset: bigint | undefined = parsed.success ? decodeBlob(parsed.data.Offset) : undefined;
    const size: bigint | undefined = parsed.success ? decodeBlob(parsed.data.Size) : undefined;
    if (guid === undefined || offset === undefined || size === undefined) {
      reader.invalid(`FileManifestList[${file.Filename}].FileChunkParts[${index}]`, 'not a valid chunk part, skipped');
      return;
    }
    if (offset > UINT32_MAX || size > UINT32_MAX) {
      reader.invalid(`FileManifestList[${file.Filename}].FileChunkParts[${index}]`, 'offset or size wider than 32 bits, skipped');
      return;
    }
    parts.push({ dataSize: 0, parentGuid: guid, offset: Number(offset), size: Number(size) });
  });
  return parts;
}

function readFiles(reader: JsonFieldReader): RawFileManifest[] {
  const entries: unknown[] = reader.take('FileManifestList', z.array(z.unknown()), []);
  const files: RawFileManifest[] = [];
  entries.forEach((entry: unknown, index: number) => {
    const parsed = fileSchema.safeParse(entry);
    if (!parsed.success) {
      reader.invalid(`FileManifestList[${index}]`, 'not a valid file entry, skipped');
      return;
    }
    const file: JsonFile = parsed.data;
    const shaHash: string | undefined = file.FileHash === undefined ? '' : decodeFileHash(file.FileHash);
    if (shaHash === undefined) {
      reader.invalid(`FileManifestList[${file.Filename}].FileHash`, 'not a 20-byte hash');
    }
    files.push({
      filename: file.Filename,
      symlinkTarget: file.SymlinkTarget ?? '',
      shaHash: shaHash ?? '',
      fileMetaFlags: (file.bIsReadOnly === true ? FILE_META_READ_ONLY : 0)
        | (file.bIsCompressed === true ? FILE_META_COMPRESSED : 0)
        | (file.bIsUnixExecutable === true ? FILE_META_UNIX_EXECUTABLE : 0),
      installTags: file.InstallTags ?? [],
      chunkParts: readChunkParts(file, reader)
    });
  });
  return files;
}

/**
 * Parses the raw bytes as a JSON object document.
 * @throws {ManifestParseError} with code INVALID_JSON when the bytes are not a JSON object
 */
export function parseJsonDocument(bytes: Uint8Array): JsonDocument {
  const text: string = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8').replace(/^\uFEFF/, '');
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new ManifestParseError('INVALID_JSON', `Not a binary manifest and not valid JSON: ${error instanceof Error ? error.message : String(error)}`, error);
  }
  const document = documentSchema.safeParse(value);
  if (!document.success) {
    throw new ManifestParseError('INVALID_JSON', 'Not a binary manifest and the JSON document is not an object');
  }
  return document.data;
}

/**
 * Decodes a JSON manifest into the same model the binary decoder produces.
 */
export function readJsonManifest(bytes: Uint8Array, warnings: WarningCollector): Omit<Manifest, 'warnings'> {
  const reader = new JsonFieldReader(parseJsonDocument(bytes), warnings);

  const header: ManifestHeader = {
    headerSize: 0,
    dataSizeUncompressed: 0,
    dataSizeCompressed: 0,
    sha1Hash: '',
    storedAs: 0,
    version: toUint32(reader.blob('ManifestFileVersion')),
    guid: '',
    rollingHash: 0,
    hashType: 0
  };

  const meta: ManifestMeta = {
    dataSize: 0,
    dataVersion: 0,
    featureLevel: 0,
    isFileData: reader.take('bIsFileData', z.boolean(), true),
    appId: toUint32(reader.blob('AppID')) | 0,
    appName: reader.take('AppNameString', z.string(), ''),
    buildVersion: reader.take('BuildVersionString', z.string(), ''),
    launchExe: reader.take('LaunchExeString', z.string(), ''),
    launchCommand: reader.take('LaunchCommand', z.string(), ''),
    prereqIds: reader.take('PrereqIds', z.array(z.string()), []),
    prereqName: reader.take('PrereqName', z.string(), ''),
    prereqPath: reader.take('PrereqPath', z.string(), ''),
    prereqArgs: reader.take('PrereqArgs', z.string(), '')
  };

  const rawFiles: RawFileManifest[] = readFiles(reader);
  const chunkList: ChunkDataList = synthesizeChunkList(rawFiles, {
    hashes: canonicalKeys(reader.take('ChunkHashList', guidMapSchema, {})),
    shas: canonicalKeys(reader.take('ChunkShaList', guidMapSchema, {})),
    groups: canonicalKeys(reader.take('DataGroupList', guidMapSchema, {})),
    fileSizes: canonicalKeys(reader.take('ChunkFilesizeList', guidMapSchema, {}))
  });

  const fileManifestList: FileManifest[] = rawFiles.map((file: RawFileManifest) => finalizeFileManifest(file, chunkList, warnings));
  warnings.debug(`Decoded JSON manifest: ${chunkList.elements.length} chunks, ${fileManifestList.length} files`);

  return {
    format: 'json',
    header,
    meta,
    chunkList,
    fileList: {
      dataSize: 0,
      dataVersion: 0,
      count: fileManifestList.length,
      fileManifestList
    }
  };
}
