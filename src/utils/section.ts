/**
 * Size-prefixed section framing shared by the meta, chunk list and file list decoders.
 */
import { MAX_SECTION_SIZE } from '../constants/manifest-format.js';
import type { ManifestSection, WarningCollector } from '../types/warnings.js';
import type { ByteCursor, ReadResult } from './byte-cursor.js';

export interface SectionFrame {
  readonly section: ManifestSection;
  readonly start: number;
  /** Declared size, covering the size field itself. */
  readonly dataSize: number;
  readonly dataVersion: number;
  /** Reader confined to the section, positioned after `dataSize` and `dataVersion`. */
  readonly cursor: ByteCursor;
  /** The declared end lies beyond the available bytes. */
  readonly clipped: boolean;
}

/**
 * Reads `dataSize` and `dataVersion` and confines further reads to the declared section.
 * @returns null when not even the frame could be read, or the declared size is implausible
 */
export function openSection(payload: ByteCursor, section: ManifestSection, warnings: WarningCollector): SectionFrame | null {
  const start: number = payload.offset;
  const dataSize: ReadResult<number> = payload.u32();
  if (dataSize.status !== 'ok') {
    warnings.add('SECTION_TRUNCATED', `No ${section} section present at offset ${start}`, section);
    return null;
  }
  if (dataSize.value === 0 || dataSize.value > MAX_SECTION_SIZE) {
    warnings.add('SECTION_INVALID', `Invalid ${section} data size ${dataSize.value} at offset ${start}`, section);
    return null;
  }

  const cursor: ByteCursor = payload.window(start, dataSize.value);
  cursor.seek(start + 4);
  const dataVersion: ReadResult<number> = cursor.u8();
  if (dataVersion.status !== 'ok') {
    warnings.add('SECTION_TRUNCATED', `${section} section ends before its data version`, section);
    return null;
  }

  warnings.debug(`Reading ${section} at offset ${start}: size ${dataSize.value}, version ${dataVersion.value}`);
  return {
    section,
    start,
    dataSize: dataSize.value,
    dataVersion: dataVersion.value,
    cursor,
    clipped: start + dataSize.value > payload.limit
  };
}

/**
 * Moves the payload reader to the declared end of the section, skipping anything not understood.
 */
export function closeSection(payload: ByteCursor, frame: SectionFrame): void {
  payload.seek(frame.start + frame.dataSize);
}
