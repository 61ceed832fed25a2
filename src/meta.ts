/**
 * Meta section: application identity, build and launch information.
 */
import type { ManifestMeta } from './types/manifest.js';
import type { WarningCollector } from './types/warnings.js';
import type { ByteCursor } from './utils/byte-cursor.js';
import { closeSection, openSection } from './utils/section.js';
import type { SectionFrame } from './utils/section.js';
import { fieldsOf, readFields } from './utils/section-fields.js';
import type { Draft, FieldDescriptor, FieldWalkResult } from './utils/section-fields.js';

const metaField = fieldsOf<Draft<ManifestMeta>>();

/**
 * Meta fields in wire order, each tagged with the data version that introduced it.
 */
export const META_FIELDS: readonly FieldDescriptor<Draft<ManifestMeta>>[] = [
  metaField('featureLevel', 0, (cursor: ByteCursor) => cursor.i32()),
  metaField('isFileData', 0, (cursor: ByteCursor) => cursor.bool()),
  metaField('appId', 0, (cursor: ByteCursor) => cursor.i32()),
  metaField('appName', 0, (cursor: ByteCursor) => cursor.fstring()),
  metaField('buildVersion', 0, (cursor: ByteCursor) => cursor.fstring()),
  metaField('launchExe', 0, (cursor: ByteCursor) => cursor.fstring()),
  metaField('launchCommand', 0, (cursor: ByteCursor) => cursor.fstring()),
  metaField('prereqIds', 0, (cursor: ByteCursor) => cursor.fstringArray()),
  metaField('prereqName', 0, (cursor: ByteCursor) => cursor.fstring()),
  metaField('prereqPath', 0, (cursor: ByteCursor) => cursor.fstring()),
  metaField('prereqArgs', 0, (cursor: ByteCursor) => cursor.fstring()),
  metaField('buildId', 1, (cursor: ByteCursor) => cursor.fstring()),
  metaField('uninstallActionPath', 2, (cursor: ByteCursor) => cursor.fstring()),
  metaField('uninstallActionArgs', 2, (cursor: ByteCursor) => cursor.fstring())
];

function emptyMeta(dataSize: number, dataVersion: number): Draft<ManifestMeta> {
  return {
    dataSize,
    dataVersion,
    featureLevel: 0,
    isFileData: false,
    appId: 0,
    appName: '',
    buildVersion: '',
    launchExe: '',
    launchCommand: '',
    prereqIds: [],
    prereqName: '',
    prereqPath: '',
    prereqArgs: ''
  };
}

/**
 * Decodes the meta section at the payload cursor and leaves the cursor at its declared end.
 * Fields after a short read keep their defaults; the section is only absent when its frame is unreadable.
 */
export function readManifestMeta(payload: ByteCursor, warnings: WarningCollector): ManifestMeta | undefined {
  const frame: SectionFrame | null = openSection(payload, 'meta', warnings);
  if (frame === null) {
    return undefined;
  }

  const meta: Draft<ManifestMeta> = emptyMeta(frame.dataSize, frame.dataVersion);
  const walk: FieldWalkResult = readFields(frame.cursor, frame.dataVersion, META_FIELDS, meta);
  if (walk.stop === 'exhausted' || (walk.stop === 'section-end' && frame.clipped)) {
    warnings.add('SECTION_TRUNCATED', `Meta section ends before field "${walk.lastField ?? ''}"`, 'meta');
  } else if (walk.stop === 'invalid') {
    warnings.add('SECTION_INVALID', `Meta field "${walk.lastField ?? ''}": ${walk.reason ?? 'unreadable'}`, 'meta');
  }

  closeSection(payload, frame);
  return meta;
}
