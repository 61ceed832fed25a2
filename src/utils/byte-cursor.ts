/**
 * Bounds-checked little-endian reader over an in-memory buffer.
 *
 * No read ever throws: running past the end yields an `exhausted` result and leaves the
 * position unchanged, so callers decide locally whether a short read ends the section.
 */
import { GUID_BYTES, MAX_SECTION_SIZE } from '../constants/manifest-format.js';
import { formatGuid } from './guid.js';

export type ReadResult<T> =
  | { readonly status: 'ok'; readonly value: T }
  | { readonly status: 'exhausted' }
  | { readonly status: 'invalid'; readonly reason: string };

const INT32_MIN = -0x80000000;

export const EXHAUSTED: ReadResult<never> = { status: 'exhausted' };

export function ok<T>(value: T): ReadResult<T> {
  return { status: 'ok', value };
}

export function invalid(reason: string): ReadResult<never> {
  return { status: 'invalid', reason };
}

export class ByteCursor {
  private readonly buffer: Buffer;
  private readonly start: number;
  private readonly end: number;
  private position: number;

  constructor(bytes: Uint8Array, start: number = 0, end: number = bytes.length) {
    this.buffer = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.end = Math.max(0, Math.min(end, this.buffer.length));
    this.start = Math.max(0, Math.min(start, this.end));
    this.position = this.start;
  }

  /** Absolute position in the underlying buffer. */
  get offset(): number {
    return this.position;
  }

  /** Bytes consumed since this cursor's start. */
  get consumed(): number {
    return this.position - this.start;
  }

  get remaining(): number {
    return this.end - this.position;
  }

  get limit(): number {
    return this.end;
  }

  get isExhausted(): boolean {
    return this.position >= this.end;
  }

  /**
   * Moves to an absolute offset, clamped to this cursor's window.
   */
  seek(offset: number): void {
    this.position = Math.max(this.start, Math.min(offset, this.end));
  }

  /**
   * Returns a cursor over `[offset, offset + length)`, clamped to this cursor's window.
   * The parent position is not moved.
   */
  window(offset: number, length: number): ByteCursor {
    const from: number = Math.max(this.start, Math.min(offset, this.end));
    return new ByteCursor(this.buffer, from, Math.min(this.end, from + Math.max(0, length)));
  }

  skip(count: number): ReadResult<void> {
    if (count < 0 || count > this.remaining) {
      return EXHAUSTED;
    }
    this.position += count;
    return ok(undefined);
  }

  u8(): ReadResult<number> {
    return this.fixed(1, (at: number) => this.buffer.readUInt8(at));
  }

  bool(): ReadResult<boolean> {
    return this.fixed(1, (at: number) => this.buffer.readUInt8(at) !== 0);
  }

  i8(): ReadResult<number> {
    return this.fixed(1, (at: number) => this.buffer.readInt8(at));
  }

  u16(): ReadResult<number> {
    return this.fixed(2, (at: number) => this.buffer.readUInt16LE(at));
  }

  u32(): ReadResult<number> {
    return this.fixed(4, (at: number) => this.buffer.readUInt32LE(at));
  }

  i32(): ReadResult<number> {
    return this.fixed(4, (at: number) => this.buffer.readInt32LE(at));
  }

  u64(): ReadResult<bigint> {
    return this.fixed(8, (at: number) => this.buffer.readBigUInt64LE(at));
  }

  /**
   * Reads `count` raw bytes. The returned buffer is a view, not a copy.
   */
  bytes(count: number): ReadResult<Buffer> {
    if (count < 0 || count > this.remaining) {
      return EXHAUSTED;
    }
    const slice: Buffer = this.buffer.subarray(this.position, this.position + count);
    this.position += count;
    return ok(slice);
  }

  hex(count: number): ReadResult<string> {
    const raw: ReadResult<Buffer> = this.bytes(count);
    return raw.status === 'ok' ? ok(raw.value.toString('hex')) : raw;
  }

  /**
   * Reads 16 bytes as four little-endian u32 words and renders the canonical GUID string.
   */
  guid(): ReadResult<string> {
    if (this.remaining < GUID_BYTES) {
      return EXHAUSTED;
    }
    const at: number = this.position;
    this.position += GUID_BYTES;
    return ok(formatGuid([
      this.buffer.readUInt32LE(at),
      this.buffer.readUInt32LE(at + 4),
      this.buffer.readUInt32LE(at + 8),
      this.buffer.readUInt32LE(at + 12)
    ]));
  }

  /**
   * Length-prefixed string: positive length is UTF-8 bytes, negative is UTF-16LE code units.
   * Trailing NUL terminators are dropped. A length no section could hold is `invalid`.
   */
  fstring(): ReadResult<string> {
    const mark: number = this.position;
    const length: ReadResult<number> = this.i32();
    if (length.status !== 'ok') {
      return length;
    }
    if (length.value === 0) {
      return ok('');
    }
    const utf16: boolean = length.value < 0;
    const byteLength: number = utf16 ? -length.value * 2 : length.value;
    if (length.value === INT32_MIN || byteLength > MAX_SECTION_SIZE) {
      this.position = mark;
      return invalid(`String length ${length.value} at offset ${mark} is out of range`);
    }
    const raw: ReadResult<Buffer> = this.bytes(byteLength);
    if (raw.status !== 'ok') {
      this.position = mark;
      return raw;
    }
    return ok(stripNul(raw.value.toString(utf16 ? 'utf16le' : 'utf8')));
  }

  /**
   * Count-prefixed array of strings. A short read discards the partial array.
   */
  fstringArray(): ReadResult<string[]> {
    return this.array((cursor: ByteCursor) => cursor.fstring());
  }

  /**
   * Count-prefixed homogeneous array. The count is never used to preallocate.
   */
  array<T>(readItem: (cursor: ByteCursor) => ReadResult<T>): ReadResult<T[]> {
    const mark: number = this.position;
    const count: ReadResult<number> = this.u32();
    if (count.status !== 'ok') {
      return count;
    }
    const items: T[] = [];
    for (let i = 0; i < count.value; i++) {
      const item: ReadResult<T> = readItem(this);
      if (item.status !== 'ok') {
        this.position = mark;
        return item;
      }
      items.push(item.value);
    }
    return ok(items);
  }

  private fixed<T>(width: number, read: (at: number) => T): ReadResult<T> {
    if (this.remaining < width) {
      return EXHAUSTED;
    }
    const value: T = read(this.position);
    this.position += width;
    return ok(value);
  }
}

function stripNul(value: string): string {
  let end: number = value.length;
  while (end > 0 && value.charCodeAt(end - 1) === 0) {
    end -= 1;
  }
  return value.slice(0, end);
}
