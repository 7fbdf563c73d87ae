import { isFileType, type EntityMetadata } from '@/client/types';
import { SynapseFsError, unsupported } from '@/errors';

export interface SynapseFileAttributes {
  entityId: string;
  name: string;
  size: number;
  lastModifiedTime: Date;
  /** Synapse does not track access; mirrors `lastModifiedTime`. */
  lastAccessTime: Date;
  creationTime: Date;
  isRegularFile: boolean;
  isDirectory: boolean;
  isSymbolicLink: boolean;
  isOther: boolean;
  fileKey: string;
  contentType?: string;
  md5?: string;
}

export type BasicAttributeName =
  | 'size'
  | 'lastModifiedTime'
  | 'isDirectory'
  | 'isRegularFile'
  | 'isSymbolicLink'
  | 'isOther';

export type AttributeMap = Partial<Record<BasicAttributeName, number | boolean | Date>>;

const BASIC_ATTRIBUTES: readonly BasicAttributeName[] = [
  'size',
  'lastModifiedTime',
  'isDirectory',
  'isRegularFile',
  'isSymbolicLink',
  'isOther',
];

const isBasicAttributeName = (value: string): value is BasicAttributeName =>
  BASIC_ATTRIBUTES.some((name) => name === value);

const parseTime = (timestamp: string | undefined): Date => {
  if (!timestamp) {
    return new Date(0);
  }
  const parsed = new Date(timestamp);
  return Number.isNaN(parsed.getTime()) ? new Date(0) : parsed;
};

export const toFileAttributes = (entity: EntityMetadata): SynapseFileAttributes => {
  const isFile = isFileType(entity.concreteType);
  const lastModifiedTime = parseTime(entity.modifiedOn);

  return {
    entityId: entity.id,
    name: entity.name,
    size: entity.fileSize ?? 0,
    lastModifiedTime,
    lastAccessTime: lastModifiedTime,
    creationTime: parseTime(entity.createdOn),
    isRegularFile: isFile,
    isDirectory: !isFile,
    isSymbolicLink: false,
    isOther: false,
    fileKey: entity.id,
    contentType: entity.contentType,
    md5: entity.md5,
  };
};

/**
 * Select attributes with `*`, `basic:*` or `basic:size,isDirectory`.
 * Names outside the basic set are ignored.
 */
export const selectAttributes = (attributes: SynapseFileAttributes, selector: string): AttributeMap => {
  const separator = selector.indexOf(':');
  const view = separator >= 0 ? selector.slice(0, separator) : 'basic';
  const names = separator >= 0 ? selector.slice(separator + 1) : selector;

  if (view !== 'basic') {
    throw unsupported(`Attribute view '${view}' not supported`);
  }
  if (names.trim().length === 0) {
    throw new SynapseFsError(`No attributes requested in '${selector}'`, 'INVALID_ARGUMENT');
  }

  const requested =
    names.trim() === '*'
      ? BASIC_ATTRIBUTES
      : names
          .split(',')
          .map((name) => name.trim())
          .filter(isBasicAttributeName);

  const result: AttributeMap = {};
  for (const name of requested) {
    result[name] = attributes[name];
  }
  return result;
};
