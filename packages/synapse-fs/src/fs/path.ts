import type { EntityLookup } from '@/client/types';
import { SynapseFsError } from '@/errors';
import { getLogger } from '@/telemetry/logger';
import { OnceCell } from './once-cell';

export const SCHEME = 'syn';
export const URI_PREFIX = `${SCHEME}://`;
export const SEPARATOR = '/';

const WRITE_TARGET_PATTERN = /^(syn\d+)\/(.+)$/;
const ENTITY_PATTERN = /^(syn\d+)(?:\.(\d+))?$/;

const logger = () => getLogger('SynapsePath');

const normalizeRelativeName = (input: string): string =>
  input
    .split(SEPARATOR)
    .filter((segment) => segment.length > 0)
    .join(SEPARATOR);

const lastSegment = (relativeName: string): string => {
  const segments = relativeName.split(SEPARATOR);
  return segments[segments.length - 1] ?? relativeName;
};

/** Path to an existing entity, optionally pinned to a version. */
export class EntityPath {
  readonly kind = 'entity' as const;

  private readonly nameCell = new OnceCell<string>();

  constructor(
    readonly entityId: string,
    readonly version: number | null = null,
    readonly lookup?: EntityLookup
  ) {}

  get relativeName(): null {
    return null;
  }

  /**
   * Name of the entity as reported by Synapse. Falls back to the entity id when no lookup
   * is attached or the lookup fails, so rendering a path never rejects.
   */
  displayName(): Promise<string> {
    return this.nameCell.get(async () => {
      if (!this.lookup) {
        return this.entityId;
      }
      try {
        const entity = await this.lookup.getEntity(this.entityId, this.version);
        return entity.name;
      } catch (error) {
        logger().debug({ err: error, entityId: this.entityId }, 'Display name lookup failed, using entity id');
        return this.entityId;
      }
    });
  }

  resolve(segment: string): SynapsePath {
    const relativeName = normalizeRelativeName(segment);
    if (relativeName.length === 0) {
      return this;
    }
    return new WriteTargetPath(this.entityId, relativeName, this.lookup);
  }

  parent(): null {
    return null;
  }

  fileName(): EntityPath {
    return this;
  }

  toUri(): string {
    return formatPath(this);
  }

  toString(): string {
    return this.nameCell.peek() ?? this.entityId;
  }
}

/** Not-yet-existing file inside folder `entityId`, used as an upload destination. */
export class WriteTargetPath {
  readonly kind = 'write-target' as const;

  readonly relativeName: string;

  constructor(
    readonly entityId: string,
    relativeName: string,
    readonly lookup?: EntityLookup
  ) {
    const normalized = normalizeRelativeName(relativeName);
    if (normalized.length === 0) {
      throw new SynapseFsError('Write target name cannot be empty', 'INVALID_PATH');
    }
    this.relativeName = normalized;
  }

  get version(): null {
    return null;
  }

  displayName(): Promise<string> {
    return Promise.resolve(lastSegment(this.relativeName));
  }

  resolve(segment: string): WriteTargetPath {
    const appended = normalizeRelativeName(segment);
    if (appended.length === 0) {
      return this;
    }
    return new WriteTargetPath(this.entityId, `${this.relativeName}${SEPARATOR}${appended}`, this.lookup);
  }

  parent(): EntityPath {
    return new EntityPath(this.entityId, null, this.lookup);
  }

  fileName(): WriteTargetPath {
    return new WriteTargetPath(this.entityId, lastSegment(this.relativeName), this.lookup);
  }

  toUri(): string {
    return formatPath(this);
  }

  toString(): string {
    return lastSegment(this.relativeName);
  }
}

export type SynapsePath = EntityPath | WriteTargetPath;

export const isSynapsePath = (value: unknown): value is SynapsePath =>
  value instanceof EntityPath || value instanceof WriteTargetPath;

/**
 * Parse `syn://syn123`, `syn://syn123.4` or `syn://syn123/dir/file.txt`.
 * The scheme is optional; trailing slashes and repeated separators are ignored.
 */
export const parsePath = (rawUri: string, lookup?: EntityLookup): SynapsePath => {
  let value = rawUri.trim();
  if (value.startsWith(URI_PREFIX)) {
    value = value.slice(URI_PREFIX.length);
  }
  value = value.replace(/\/+$/, '');

  const writeTarget = WRITE_TARGET_PATTERN.exec(value);
  if (writeTarget) {
    const [, entityId, rest] = writeTarget;
    if (entityId && rest && normalizeRelativeName(rest).length > 0) {
      return new WriteTargetPath(entityId, rest, lookup);
    }
  }

  const entity = ENTITY_PATTERN.exec(value);
  if (entity) {
    const [, entityId, versionText] = entity;
    if (entityId) {
      if (versionText === undefined) {
        return new EntityPath(entityId, null, lookup);
      }
      const version = Number(versionText);
      if (Number.isSafeInteger(version)) {
        return new EntityPath(entityId, version, lookup);
      }
    }
  }

  throw new SynapseFsError(
    `Invalid Synapse path: '${rawUri}'. Expected syn://synXXX, syn://synXXX.N or syn://synXXX/name`,
    'INVALID_PATH'
  );
};

export const formatPath = (path: SynapsePath): string => {
  if (path.kind === 'write-target') {
    return `${URI_PREFIX}${path.entityId}${SEPARATOR}${path.relativeName}`;
  }
  return path.version === null
    ? `${URI_PREFIX}${path.entityId}`
    : `${URI_PREFIX}${path.entityId}.${path.version}`;
};

export const pathsEqual = (a: SynapsePath, b: SynapsePath): boolean =>
  a.entityId === b.entityId && a.version === b.version && a.relativeName === b.relativeName;

export const comparePaths = (a: SynapsePath, b: SynapsePath): number => {
  if (a.entityId !== b.entityId) {
    return a.entityId < b.entityId ? -1 : 1;
  }

  const versionDelta = (a.version ?? 0) - (b.version ?? 0);
  if (versionDelta !== 0) {
    return versionDelta < 0 ? -1 : 1;
  }

  const aName = a.relativeName ?? '';
  const bName = b.relativeName ?? '';
  if (aName === bName) {
    return 0;
  }
  return aName < bName ? -1 : 1;
};
