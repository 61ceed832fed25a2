/**
 * Read-only queries over a decoded manifest.
 */
import type { Chunk, ChunkDataList, ChunkPart, FileManifest, FileManifestList, Manifest } from './types/manifest.js';

export interface ManifestSizes {
  /** Sum of compressed chunk sizes. */
  readonly downloadSize: bigint;
  /** Sum of uncompressed chunk sizes, using the compressed size where a window size is missing. */
  readonly installedSize: bigint;
  readonly chunkCount: number;
  readonly fileCount: number;
}

export function computeManifestSizes(manifest: Manifest): ManifestSizes {
  const chunks: readonly Chunk[] = manifest.chunkList?.elements ?? [];
  let downloadSize = 0n;
  let installedSize = 0n;
  for (const chunk of chunks) {
    const fileSize: bigint = BigInt(chunk.fileSize);
    downloadSize += fileSize;
    installedSize += chunk.windowSize > 0 ? BigInt(chunk.windowSize) : fileSize;
  }
  return {
    downloadSize,
    installedSize,
    chunkCount: chunks.length,
    fileCount: manifest.fileList?.fileManifestList.length ?? 0
  };
}

export function findFile(manifest: Manifest, filename: string): FileManifest | undefined {
  return manifest.fileList?.fileManifestList.find((file: FileManifest) => file.filename === filename);
}

/**
 * Files carrying `tag`. Untagged files belong to every install, so they always match.
 */
export function filesWithInstallTag(manifest: Manifest, tag: string): FileManifest[] {
  return (manifest.fileList?.fileManifestList ?? []).filter((file: FileManifest) => file.installTags.length === 0 || file.installTags.includes(tag));
}

export function getChunkForPart(manifest: Manifest, part: ChunkPart): Chunk | undefined {
  const index: number | undefined = part.chunkIndex ?? manifest.chunkList?.chunkLookup.get(part.parentGuid.toLowerCase());
  return index === undefined ? undefined : manifest.chunkList?.elements[index];
}

export type SerializableChunkPart = Omit<ChunkPart, 'chunk'>;

export type SerializableFileManifest = Omit<FileManifest, 'chunkParts'> & { readonly chunkParts: readonly SerializableChunkPart[] };

export type SerializableManifest = Omit<Manifest, 'chunkList' | 'fileList'> & {
  readonly chunkList?: Omit<ChunkDataList, 'chunkLookup'> & { readonly chunkLookup: Readonly<Record<string, number>> };
  readonly fileList?: Omit<FileManifestList, 'fileManifestList'> & { readonly fileManifestList: readonly SerializableFileManifest[] };
};

/**
 * Plain-JSON view of a manifest: the lookup map becomes a record and parts keep only their chunk index.
 */
export function toSerializableManifest(manifest: Manifest): SerializableManifest {
  const { chunkList, fileList, ...rest } = manifest;
  return {
    ...rest,
    ...(chunkList !== undefined
      ? { chunkList: { ...chunkList, chunkLookup: Object.fromEntries(chunkList.chunkLookup) } }
      : {}),
    ...(fileList !== undefined
      ? {
          fileList: {
            ...fileList,
            fileManifestList: fileList.fileManifestList.map((file: FileManifest): SerializableFileManifest => ({
              ...file,
              chunkParts: file.chunkParts.map(({ chunk: _chunk, ...part }: ChunkPart): SerializableChunkPart => part)
            }))
          }
        }
      : {})
  };
}
