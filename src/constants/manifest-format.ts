/**
 * Wire-level constants of the binary manifest container.
 */

/** First four bytes of every binary manifest (little-endian u32). */
export const MANIFEST_MAGIC = 0x44bec00c;

/** Header length up to and including the `storedAs` byte. */
export const LEGACY_HEADER_SIZE = 37;

/** Header length of the generation that adds the container version. */
export const HEADER_SIZE = 41;

export const STORED_COMPRESSED = 0x01;
export const STORED_ENCRYPTED = 0x02;

/** zlib CMF byte for deflate with a 32 KiB window. */
export const ZLIB_CMF = 0x78;
/** FLG bytes written at the fastest, default and best compression levels. */
export const ZLIB_FLG_BYTES: readonly number[] = [0x01, 0x9c, 0xda];
/** Where a zlib stream sits inside a payload that is flagged as stored but was compressed anyway. */
export const STORED_ZLIB_OFFSET = 9;
/** Extra output allowed past the declared size before inflate is stopped; the excess is then cut. */
export const INFLATE_OVERRUN_SLACK = 64 * 1024;

export const FILE_META_READ_ONLY = 0x01;
export const FILE_META_COMPRESSED = 0x02;
export const FILE_META_UNIX_EXECUTABLE = 0x04;

export const SHA1_BYTES = 20;
export const MD5_BYTES = 16;
export const SHA256_BYTES = 32;
export const GUID_BYTES = 16;

/** Serialized size of a chunk part record: dataSize + GUID + offset + size. */
export const CHUNK_PART_SIZE = 28;

/** Upper bound for a section's declared `dataSize`. */
export const MAX_SECTION_SIZE = 1024 * 1024 * 1024;

export const DEFAULT_MIME_TYPE = 'application/octet-stream';
