/**
 * Decoded manifest model. Every structure is produced once by the parser and only read afterwards.
 */
import type { ManifestWarning } from './warnings.js';

export type ManifestFormat = 'binary' | 'json';

export interface ManifestHeader {
  readonly headerSize: number;
  readonly dataSizeUncompressed: number;
  readonly dataSizeCompressed: number;
  /** Hex SHA-1 of the uncompressed payload, empty for JSON manifests. */
  readonly sha1Hash: string;
  /** Storage bit flags, see `STORED_COMPRESSED` and `STORED_ENCRYPTED`. */
  readonly storedAs: number;
  readonly version: number;
  readonly guid: string;
  readonly rollingHash: number;
  readonly hashType: number;
}

export interface ManifestMeta {
  readonly dataSize: number;
  readonly dataVersion: number;
  readonly featureLevel: number;
  readonly isFileData: boolean;
  readonly appId: number;
  readonly appName: string;
  readonly buildVersion: string;
  readonly launchExe: string;
  readonly launchCommand: string;
  readonly prereqIds: readonly string[];
  readonly prereqName: string;
  readonly prereqPath: string;
  readonly prereqArgs: string;
  /** Present from meta data version 1. */
  readonly buildId?: string;
  /** Present from meta data version 2. */
  readonly uninstallActionPath?: string;
  /** Present from meta data version 2. */
  readonly uninstallActionArgs?: string;
}

export interface Chunk {
  readonly guid: string;
  /** 64-bit rolling hash as 16 lowercase hex characters. */
  readonly hash: string;
  readonly shaHash: string;
  readonly group: number;
  /** Uncompressed chunk length in bytes. */
  readonly windowSize: number;
  /** Compressed chunk length in bytes, as a decimal string so 64-bit values survive. */
  readonly fileSize: string;
}

export interface ChunkDataList {
  readonly dataSize: number;
  readonly dataVersion: number;
  /** Declared count; `elements.length` is what was actually decoded. */
  readonly count: number;
  readonly elements: readonly Chunk[];
  /** Canonical GUID to index into `elements`, first occurrence wins. */
  readonly chunkLookup: ReadonlyMap<string, number>;
}

export interface ChunkPart {
  readonly dataSize: number;
  readonly parentGuid: string;
  readonly offset: number;
  readonly size: number;
  /** Index into `ChunkDataList.elements`, absent when the GUID is not in the catalog. */
  readonly chunkIndex?: number;
  /** The catalog entry itself (same object as `elements[chunkIndex]`). */
  readonly chunk?: Chunk;
}

export interface FileManifest {
  readonly filename: string;
  readonly symlinkTarget: string;
  readonly shaHash: string;
  readonly fileMetaFlags: number;
  readonly installTags: readonly string[];
  readonly chunkParts: readonly ChunkPart[];
  /** Sum of every chunk part size. */
  readonly fileSize: number;
  readonly mimeType: string;
  readonly hasUnresolvedChunkParts: boolean;
  readonly md5Hash?: string;
  readonly sha256Hash?: string;
}

export interface FileManifestList {
  readonly dataSize: number;
  readonly dataVersion: number;
  readonly count: number;
  readonly fileManifestList: readonly FileManifest[];
}

/**
 * Result of hashing whatever payload bytes could be recovered.
 */
export interface PayloadIntegrity {
  readonly expectedSha1: string;
  readonly actualSha1: string;
  readonly sha1Matches: boolean;
  /** Declared uncompressed payload size. */
  readonly expectedSize: number;
  /** Bytes actually recovered. */
  readonly actualSize: number;
  readonly complete: boolean;
}

export interface Manifest {
  readonly format: ManifestFormat;
  readonly header: ManifestHeader;
  readonly meta?: ManifestMeta;
  readonly chunkList?: ChunkDataList;
  readonly fileList?: FileManifestList;
  /** Only set for binary manifests. */
  readonly integrity?: PayloadIntegrity;
  readonly warnings: readonly ManifestWarning[];
}
