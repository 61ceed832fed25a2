import { describe, expect, it } from 'vitest';
import { ByteCursor } from '../src/utils/byte-cursor.js';
import { canonicalizeGuid, formatGuid } from '../src/utils/guid.js';
import { ManifestWriter } from './helpers/manifest-writer.js';

describe('ByteCursor', () => {
  it('reads little-endian integers of every width', () => {
    const bytes = new ManifestWriter()
      .uint8(0xfe)
      .int32(-1)
      .uint32(0x44bec00c)
      .uint64(0x0102030405060708n)
      .toBuffer();
    const cursor = new ByteCursor(bytes);

    expect(cursor.i8()).toEqual({ status: 'ok', value: -2 });
    expect(cursor.i32()).toEqual({ status: 'ok', value: -1 });
    expect(cursor.u32()).toEqual({ status: 'ok', value: 0x44bec00c });
    expect(cursor.u64()).toEqual({ status: 'ok', value: 0x0102030405060708n });
    expect(cursor.isExhausted).toBe(true);
  });

  it('signals exhaustion without moving', () => {
    const cursor = new ByteCursor(Buffer.from([1, 2, 3]));

    expect(cursor.u32()).toEqual({ status: 'exhausted' });
    expect(cursor.offset).toBe(0);
    expect(cursor.u16()).toEqual({ status: 'ok', value: 0x0201 });
    expect(cursor.remaining).toBe(1);
  });

  it('decodes UTF-8 and UTF-16 strings and trims terminators', () => {
    const bytes = new ManifestWriter()
      .fstring('Game.exe')
      .fstringUtf16('Größe')
      .int32(6)
      .bytes(Buffer.from('abc\0\0\0', 'utf8'))
      .int32(0)
      .toBuffer();
    const cursor = new ByteCursor(bytes);

    expect(cursor.fstring()).toEqual({ status: 'ok', value: 'Game.exe' });
    expect(cursor.fstring()).toEqual({ status: 'ok', value: 'Größe' });
    expect(cursor.fstring()).toEqual({ status: 'ok', value: 'abc' });
    expect(cursor.fstring()).toEqual({ status: 'ok', value: '' });
  });

  it('rewinds a string whose declared length runs past the end', () => {
    const bytes = new ManifestWriter().int32(-10).uint32(0).toBuffer();
    const cursor = new ByteCursor(bytes);

    expect(cursor.fstring()).toEqual({ status: 'exhausted' });
    expect(cursor.offset).toBe(0);
  });

  it('rejects string lengths no section could hold', () => {
    const cursor = new ByteCursor(new ManifestWriter().int32(-0x80000000).int32(0x7fffffff).toBuffer());

    expect(cursor.fstring()).toEqual({ status: 'invalid', reason: 'String length -2147483648 at offset 0 is out of range' });
    expect(cursor.offset).toBe(0);
    cursor.seek(4);
    expect(cursor.fstring()).toEqual({ status: 'invalid', reason: 'String length 2147483647 at offset 4 is out of range' });
  });

  it('discards a partially read array', () => {
    const bytes = new ManifestWriter().uint32(3).fstring('a').fstring('b').toBuffer();
    const cursor = new ByteCursor(bytes);

    expect(cursor.fstringArray()).toEqual({ status: 'exhausted' });
    expect(cursor.offset).toBe(0);
  });

  it('renders GUIDs from four little-endian words', () => {
    const raw = Buffer.alloc(16);
    raw.set([0x3d, 0x2c, 0x1b, 0x0a]);

    expect(new ByteCursor(raw).guid()).toEqual({ status: 'ok', value: '0a1b2c3d-0000-0000-0000-000000000000' });

    const written = new ManifestWriter().guid('0a1b2c3d-4e5f-6071-8293-a4b5c6d7e8f9').toBuffer();
    expect(new ByteCursor(written).guid()).toEqual({ status: 'ok', value: '0a1b2c3d-4e5f-6071-8293-a4b5c6d7e8f9' });
    expect(new ByteCursor(written.subarray(0, 15)).guid()).toEqual({ status: 'exhausted' });
  });

  it('clamps windows and seeks to its own range', () => {
    const cursor = new ByteCursor(Buffer.alloc(10), 2, 6);
    expect(cursor.remaining).toBe(4);

    cursor.seek(100);
    expect(cursor.offset).toBe(6);
    expect(cursor.isExhausted).toBe(true);

    cursor.seek(0);
    expect(cursor.offset).toBe(2);
    expect(cursor.consumed).toBe(0);

    const window = new ByteCursor(Buffer.alloc(10)).window(4, 100);
    expect(window.remaining).toBe(6);
    expect(window.u32().status).toBe('ok');
    expect(window.u32()).toEqual({ status: 'exhausted' });
  });

  it('refuses to skip past the end', () => {
    const cursor = new ByteCursor(Buffer.alloc(4));

    expect(cursor.skip(5)).toEqual({ status: 'exhausted' });
    expect(cursor.skip(4).status).toBe('ok');
    expect(cursor.isExhausted).toBe(true);
  });
});

describe('GUID helpers', () => {
  it('pads each word to eight digits', () => {
    expect(formatGuid([1, 0xabcdef, 0, 0xffffffff])).toBe('00000001-00ab-cdef-0000-0000ffffffff');
  });

  it('canonicalizes braces, dashes and case', () => {
    expect(canonicalizeGuid('{0A1B2C3D-4E5F-6071-8293-A4B5C6D7E8F9}')).toBe('0a1b2c3d-4e5f-6071-8293-a4b5c6d7e8f9');
    expect(canonicalizeGuid('0A1B2C3D4E5F60718293A4B5C6D7E8F9')).toBe('0a1b2c3d-4e5f-6071-8293-a4b5c6d7e8f9');
    expect(canonicalizeGuid('not-a-guid')).toBeUndefined();
  });
});
