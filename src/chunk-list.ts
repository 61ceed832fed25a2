/**
 * Chunk catalog decoding and GUID lookup.
 */
import { SHA1_BYTES } from './constants/manifest-format.js';
import type { Chunk, ChunkDataList } from './types/manifest.js';
import type { WarningCollector } from './types/warnings.js';
import type { ByteCursor, ReadResult } from './utils/byte-cursor.js';
import { closeSection, openSection } from './utils/section.js';
import type { SectionFrame } from './utils/section.js';
import type { Draft } from './utils/section-fields.js';

/**
 * Maps each chunk GUID to its index. When a GUID repeats, the first index is kept.
 */
export function buildChunkLookup(elements: readonly Chunk[], warnings?: WarningCollector): Map<string, number> {
  const lookup = new Map<string, number>();
  elements.forEach((chunk: Chunk, index: number) => {
    const key: string = chunk.guid.toLowerCase();
    if (lookup.has(key)) {
      warnings?.add('DUPLICATE_CHUNK_GUID', `Chunk ${chunk.guid} appears again at index ${index}`, 'chunkList');
      return;
    }
    lookup.set(key, index);
  });
  return lookup;
}

function emptyChunk(guid: string): Draft<Chunk> {
  return { guid, hash: '', shaHash: '', group: 0, windowSize: 0, fileSize: '0' };
}

/**
 * Fills one column of the column-major chunk table.
 * @returns false when the section ran out before every chunk got a value
 */
function readColumn<T>(cursor: ByteCursor, chunks: Draft<Chunk>[], read: (cursor: ByteCursor) => ReadResult<T>, assign: (chunk: Draft<Chunk>, value: T) => void): boolean {
  for (const chunk of chunks) {
    const result: ReadResult<T> = read(cursor);
    if (result.status !== 'ok') {
      return false;
    }
    assign(chunk, result.value);
  }
  return true;
}

/**
 * Decodes the chunk list at the payload cursor and leaves the cursor at its declared end.
 * A truncated table yields fewer elements than `count`; the element list is authoritative.
 */
export function readChunkDataList(payload: ByteCursor, warnings: WarningCollector): ChunkDataList | undefined {
  const frame: SectionFrame | null = openSection(payload, 'chunkList', warnings);
  if (frame === null) {
    return undefined;
  }
  const { cursor } = frame;

  const count: ReadResult<number> = cursor.u32();
  const declared: number = count.status === 'ok' ? count.value : 0;
  const chunks: Draft<Chunk>[] = [];

  for (let i = 0; i < declared; i++) {
    const guid: ReadResult<string> = cursor.guid();
    if (guid.status !== 'ok') {
      break;
    }
    chunks.push(emptyChunk(guid.value));
  }

  const complete: boolean = count.status === 'ok'
    && chunks.length === declared
    && readColumn(cursor, chunks, (c: ByteCursor) => c.u64(), (chunk: Draft<Chunk>, hash: bigint) => {
      chunk.hash = hash.toString(16).padStart(16, '0');
    })
    && readColumn(cursor, chunks, (c: ByteCursor) => c.hex(SHA1_BYTES), (chunk: Draft<Chunk>, sha: string) => {
      chunk.shaHash = sha;
    })
    && readColumn(cursor, chunks, (c: ByteCursor) => c.u8(), (chunk: Draft<Chunk>, group: number) => {
      chunk.group = group;
    })
    && readColumn(cursor, chunks, (c: ByteCursor) => c.u32(), (chunk: Draft<Chunk>, windowSize: number) => {
      chunk.windowSize = windowSize;
    })
    && readColumn(cursor, chunks, (c: ByteCursor) => c.u64(), (chunk: Draft<Chunk>, fileSize: bigint) => {
      chunk.fileSize = fileSize.toString();
    });

  if (!complete) {
    warnings.add('SECTION_TRUNCATED', `Chunk list decoded ${chunks.length} of ${declared} chunks, some fields missing`, 'chunkList');
  }

  closeSection(payload, frame);
  const elements: readonly Chunk[] = chunks;
  return {
    dataSize: frame.dataSize,
    dataVersion: frame.dataVersion,
    count: declared,
    elements,
    chunkLookup: buildChunkLookup(elements, warnings)
  };
}
