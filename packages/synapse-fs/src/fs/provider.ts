import { open } from 'node:fs/promises';
import { basename } from 'node:path';
import { SynapseAuthManager, type SecretsProvider } from '@/client/auth';
import { SynapseClient } from '@/client/synapse-client';
import { isFileType, type EntityMetadata, type SynapseApi } from '@/client/types';
import { loadConfig, type Config } from '@/config';
import { SynapseFsError, unsupported } from '@/errors';
import { initTelemetry } from '@/telemetry';
import { getLogger } from '@/telemetry/logger';
import { recordEntityAccess } from '@/telemetry/metrics';
import { withSpan } from '@/telemetry/tracer';
import type { EntityOperation } from '@/telemetry/types';
import { MultipartUploader } from '@/upload/uploader';
import { selectAttributes, toFileAttributes, type AttributeMap, type SynapseFileAttributes } from './attributes';
import { EOF, type SeekableByteChannel } from './channel';
import { SynapseFileSystem } from './filesystem';
import { formatPath, isSynapsePath, pathsEqual, SCHEME, type SynapsePath } from './path';
import { ReadChannel } from './read-channel';
import { WriteChannel } from './write-channel';

export type OpenOption = 'read' | 'write' | 'create' | 'create-new' | 'append' | 'truncate-existing';

export type AccessMode = 'read' | 'write' | 'execute';

/** A local filesystem path, or a Synapse path. */
export type CopyEndpoint = SynapsePath | string;

export interface DirectoryStream extends AsyncIterable<SynapsePath> {
  close(): void;
}

export interface NewFileSystemOptions {
  config?: Config;
  /** Replaces the REST client; tests pass an in-memory fake. */
  client?: SynapseApi;
  secrets?: SecretsProvider;
  scratchDir?: string;
}

const WRITE_INTENT: ReadonlySet<OpenOption> = new Set(['write', 'create', 'create-new']);

const COPY_BUFFER_BYTES = 8192;

const logger = () => getLogger('SynapseProvider');

const emptyDirectoryStream = (): DirectoryStream => ({
  [Symbol.asyncIterator]: () => ({
    next: async (): Promise<IteratorResult<SynapsePath>> => ({ done: true, value: undefined }),
  }),
  close: () => undefined,
});

let singleton: SynapseFileSystemProvider | null = null;

/** Entry point for the `syn` scheme. One filesystem is open per provider at a time. */
export class SynapseFileSystemProvider {
  readonly scheme = SCHEME;

  private fileSystem: SynapseFileSystem | null = null;

  static instance(): SynapseFileSystemProvider {
    if (!singleton) {
      singleton = new SynapseFileSystemProvider();
    }
    return singleton;
  }

  newFileSystem(options: NewFileSystemOptions = {}): SynapseFileSystem {
    if (this.fileSystem && this.fileSystem.isOpen()) {
      return this.fileSystem;
    }

    const config = options.config ?? loadConfig();
    initTelemetry(config);

    const client =
      options.client ?? new SynapseClient(config, new SynapseAuthManager(config, { secrets: options.secrets }));
    const uploader = new MultipartUploader(client, {
      limits: config.upload,
      partUploadTimeoutMs: config.http.partUploadTimeoutMs,
    });

    this.fileSystem = new SynapseFileSystem(this, {
      config,
      client,
      uploader,
      scratchDir: options.scratchDir,
    });
    logger().debug({ endpoint: config.endpoint }, 'Filesystem created');
    return this.fileSystem;
  }

  getFileSystem(): SynapseFileSystem | null {
    return this.fileSystem;
  }

  private currentFileSystem(): SynapseFileSystem {
    return this.fileSystem ?? this.newFileSystem();
  }

  getPath(uri: string): SynapsePath {
    return this.currentFileSystem().getPath(uri);
  }

  private async timed<T>(
    operation: EntityOperation,
    entityId: string,
    fn: () => Promise<T>
  ): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await fn();
      recordEntityAccess({ operation, entityId, result: 'success' }, Date.now() - startedAt);
      return result;
    } catch (error) {
      recordEntityAccess({ operation, entityId, result: 'failure' }, Date.now() - startedAt);
      throw error;
    }
  }

  private fetchEntity(path: SynapsePath): Promise<EntityMetadata> {
    const fs = this.currentFileSystem();
    return this.timed('metadata', path.entityId, () => fs.client.getEntity(path.entityId, path.version));
  }

  async newByteChannel(path: SynapsePath, options: Iterable<OpenOption> = ['read']): Promise<SeekableByteChannel> {
    const fs = this.currentFileSystem();
    const requested = new Set(options);

    if ([...requested].some((option) => WRITE_INTENT.has(option))) {
      if (path.kind !== 'write-target') {
        throw new SynapseFsError(
          `Cannot write to ${path.entityId}: path must include a filename (e.g., syn://folder/filename.txt)`,
          'INVALID_ARGUMENT'
        );
      }
      return WriteChannel.create({
        uploader: fs.uploader,
        parentFolderId: path.entityId,
        fileName: path.relativeName,
        scratchDir: fs.scratchDir,
      });
    }

    return this.timed('read', path.entityId, async () => {
      const entity = await fs.client.getEntity(path.entityId, path.version);

      if (!isFileType(entity.concreteType)) {
        const typeName = entity.concreteType.split('.').pop() ?? 'unknown type';
        throw new SynapseFsError(
          `Cannot read ${path.entityId}: entity is a ${typeName}, not a file. Only FileEntity types can be downloaded.`,
          'NOT_A_FILE'
        );
      }

      if (!entity.dataFileHandleId) {
        throw new SynapseFsError(`No file handle found for ${path.entityId}`, 'NO_FILE_HANDLE');
      }

      const presignedUrl = await fs.client.getPresignedDownloadUrl(path.entityId, entity.dataFileHandleId);
      return new ReadChannel(presignedUrl, entity.fileSize ?? -1, {
        timeoutMs: fs.config.http.downloadTimeoutMs,
      });
    });
  }

  /** Directory listing is not supported; the stream is always empty. */
  newDirectoryStream(_path: SynapsePath): DirectoryStream {
    return emptyDirectoryStream();
  }

  /** Folders are never created here; the call succeeds only if the folder exists. */
  async createDirectory(path: SynapsePath): Promise<void> {
    const folderId = path.entityId;
    const fs = this.currentFileSystem();

    if (!(await fs.client.isFolder(folderId))) {
      throw new SynapseFsError(
        `Cannot create directory: ${folderId} is not a Synapse Folder. Parent folder must already exist in Synapse.`,
        'NOT_A_FOLDER'
      );
    }
    logger().debug({ folderId }, 'Directory creation request for existing Synapse folder');
  }

  async delete(path: SynapsePath): Promise<void> {
    logger().debug({ path: formatPath(path) }, 'Delete requested for Synapse path, ignoring');
  }

  async copy(source: CopyEndpoint, target: CopyEndpoint): Promise<void> {
    if (isSynapsePath(source) && isSynapsePath(target)) {
      throw unsupported('Copy between Synapse paths is not supported');
    }

    if (isSynapsePath(target) && !isSynapsePath(source)) {
      await this.uploadLocalFile(source, target);
      return;
    }

    if (isSynapsePath(source) && !isSynapsePath(target)) {
      await this.downloadToLocal(source, target);
      return;
    }

    throw new SynapseFsError('Copy requires a Synapse path on at least one side', 'INVALID_ARGUMENT');
  }

  private async uploadLocalFile(source: string, target: SynapsePath): Promise<void> {
    logger().debug({ source, target: formatPath(target) }, 'Uploading local file to Synapse');

    const fileName = target.kind === 'write-target' ? target.relativeName : basename(source);
    await this.currentFileSystem().uploader.uploadFile(source, target.entityId, fileName);
  }

  private async downloadToLocal(source: SynapsePath, target: string): Promise<void> {
    logger().debug({ source: formatPath(source), target }, 'Downloading Synapse file to local file');

    await withSpan('synapse.download', { 'synapse.entity_id': source.entityId }, async () => {
      const channel = await this.newByteChannel(source, ['read']);
      try {
        const out = await open(target, 'w');
        try {
          const buffer = new Uint8Array(COPY_BUFFER_BYTES);
          for (;;) {
            const count = await channel.read(buffer);
            if (count === EOF) {
              break;
            }
            await out.write(buffer, 0, count);
          }
        } finally {
          await out.close();
        }
      } finally {
        await channel.close();
      }
    });
  }

  async move(_source: CopyEndpoint, _target: CopyEndpoint): Promise<never> {
    throw unsupported('Move not supported (read-only)');
  }

  isSameFile(a: SynapsePath, b: SynapsePath): boolean {
    return pathsEqual(a, b);
  }

  isHidden(_path: SynapsePath): boolean {
    return false;
  }

  async getFileStore(_path: SynapsePath): Promise<never> {
    throw unsupported('FileStore not supported');
  }

  async checkAccess(path: SynapsePath, modes: readonly AccessMode[] = []): Promise<void> {
    // Write targets name files that do not exist yet
    if (path.kind === 'write-target') {
      throw new SynapseFsError(
        `${path.relativeName}: Synapse folder/file paths are write-only destinations`,
        'NOT_FOUND'
      );
    }

    const fs = this.currentFileSystem();
    if (modes.includes('write')) {
      if (!(await fs.client.isFolder(path.entityId))) {
        throw new SynapseFsError(
          `Write access requires a Folder entity, but ${path.entityId} is not a Folder`,
          'NOT_A_FOLDER'
        );
      }
      return;
    }

    await this.fetchEntity(path);
  }

  async readAttributes(path: SynapsePath): Promise<SynapseFileAttributes> {
    if (path.kind === 'write-target') {
      throw new SynapseFsError(`${path.relativeName}: write target does not exist yet`, 'NOT_FOUND');
    }
    return toFileAttributes(await this.fetchEntity(path));
  }

  async readAttributeMap(path: SynapsePath, selector: string): Promise<AttributeMap> {
    return selectAttributes(await this.readAttributes(path), selector);
  }

  async setAttribute(_path: SynapsePath, _attribute: string, _value: unknown): Promise<never> {
    throw unsupported('Setting attributes not supported (read-only)');
  }
}
