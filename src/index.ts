/**
 * Game Manifest Parser - Main entry point
 *
 * Decodes binary and JSON build manifests into one read-only model.
 */

export { parseManifest } from './manifest-parser.js';
export { ManifestLoader, parseManifestSync, parseManifestAsync, parseManifestBuffer } from './manifest-loader.js';
export { detectManifestFormat, isCompressedPayload, isEncryptedPayload } from './header.js';
export { isReadOnly, isCompressed, isUnixExecutable } from './file-list.js';
export { computeManifestSizes, findFile, filesWithInstallTag, getChunkForPart, toSerializableManifest } from './manifest-utils.js';
export { ManifestParseError, ManifestLoadError } from './errors.js';

export type { ManifestSizes, SerializableManifest, SerializableFileManifest, SerializableChunkPart } from './manifest-utils.js';
export type { ManifestParseErrorCode } from './errors.js';
export type {
  Chunk,
  ChunkDataList,
  ChunkPart,
  FileManifest,
  FileManifestList,
  Manifest,
  ManifestFormat,
  ManifestHeader,
  ManifestMeta,
  PayloadIntegrity
} from './types/manifest.js';
export type { ManifestLogger, ManifestSection, ManifestWarning, ManifestWarningCode, ParseOptions } from './types/warnings.js';
