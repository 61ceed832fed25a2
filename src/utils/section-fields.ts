/**
 * Declarative, version-gated field lists for sections that are read field by field.
 */
import type { ByteCursor, ReadResult } from './byte-cursor.js';

export type FieldStop = 'complete' | 'version' | 'section-end' | 'exhausted' | 'invalid';

export interface FieldDescriptor<T> {
  readonly name: string;
  /** First section data version that carries this field. */
  readonly minVersion: number;
  readonly read: (cursor: ByteCursor, target: T) => ReadResult<void>;
}

export interface FieldWalkResult {
  readonly stop: FieldStop;
  /** Number of fields decoded. */
  readonly fieldsRead: number;
  readonly lastField?: string;
  readonly reason?: string;
}

/** Mutable view of a model interface, used while a section is being filled in. */
export type Draft<T> = { -readonly [K in keyof T]: T[K] };

export type FieldFactory<T> = <K extends keyof T>(key: K, minVersion: number, read: (cursor: ByteCursor) => ReadResult<T[K]>) => FieldDescriptor<T>;

/**
 * Returns a descriptor builder bound to one target type, so only the key needs inferring.
 */
export function fieldsOf<T>(): FieldFactory<T> {
  return <K extends keyof T>(key: K, minVersion: number, read: (cursor: ByteCursor) => ReadResult<T[K]>): FieldDescriptor<T> => field<T, K>(key, minVersion, read);
}

function field<T, K extends keyof T>(key: K, minVersion: number, read: (cursor: ByteCursor) => ReadResult<T[K]>): FieldDescriptor<T> {
  return {
    name: String(key),
    minVersion,
    read: (cursor: ByteCursor, target: T): ReadResult<void> => {
      const result: ReadResult<T[K]> = read(cursor);
      if (result.status !== 'ok') {
        return result;
      }
      target[key] = result.value;
      return { status: 'ok', value: undefined };
    }
  };
}

/**
 * Reads descriptors in order into `target` until one is newer than `version`,
 * the cursor window is used up, or a read comes back short.
 * Fields never reached keep whatever default `target` already holds.
 */
export function readFields<T>(cursor: ByteCursor, version: number, descriptors: readonly FieldDescriptor<T>[], target: T): FieldWalkResult {
  let fieldsRead = 0;
  for (const descriptor of descriptors) {
    if (descriptor.minVersion > version) {
      return { stop: 'version', fieldsRead };
    }
    if (cursor.isExhausted) {
      return { stop: 'section-end', fieldsRead, lastField: descriptor.name };
    }
    const result: ReadResult<void> = descriptor.read(cursor, target);
    if (result.status === 'exhausted') {
      return { stop: 'exhausted', fieldsRead, lastField: descriptor.name };
    }
    if (result.status === 'invalid') {
      return { stop: 'invalid', fieldsRead, lastField: descriptor.name, reason: result.reason };
    }
    fieldsRead += 1;
  }
  return { stop: 'complete', fieldsRead };
}
