import { DEFAULT_MIME_TYPE } from '../constants/manifest-format.js';
import { MIME_TYPES } from '../constants/mime-types.js';

/**
 * Best-effort MIME type from the last extension of a manifest-relative path.
 */
export function mimeTypeForFilename(filename: string): string {
  const name: string = filename.slice(filename.lastIndexOf('/') + 1);
  const dot: number = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) {
    return DEFAULT_MIME_TYPE;
  }
  const extension: string = name.slice(dot + 1).toLowerCase();
  return Object.hasOwn(MIME_TYPES, extension) ? MIME_TYPES[extension] : DEFAULT_MIME_TYPE;
}
