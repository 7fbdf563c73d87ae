import { mkdtemp, open, rm, type FileHandle } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { unsupported } from '@/errors';
import { getLogger } from '@/telemetry/logger';
import type { FileUploader } from '@/upload/contracts';
import { assertPosition, closedChannel, type SeekableByteChannel } from './channel';

export interface WriteChannelOptions {
  uploader: FileUploader;
  parentFolderId: string;
  /** Name under the parent folder; may contain `/` to create nested folders. */
  fileName: string;
  /** Directory for the scratch file. Defaults to the OS temp dir. */
  scratchDir?: string;
}

const logger = () => getLogger('WriteChannel');

/**
 * Buffers writes in a private scratch file and uploads it when the channel is closed.
 * Nothing is sent to Synapse before `close()`.
 */
export class WriteChannel implements SeekableByteChannel {
  private open = true;

  private offset = 0;

  private uploadedEntityId: string | null = null;

  private constructor(
    private readonly handle: FileHandle,
    private readonly scratchDir: string,
    private readonly scratchFile: string,
    private readonly options: WriteChannelOptions
  ) {}

  static async create(options: WriteChannelOptions): Promise<WriteChannel> {
    const scratchDir = await mkdtemp(join(options.scratchDir ?? tmpdir(), 'synapse-upload-'));
    const scratchFile = join(scratchDir, 'content');
    try {
      const handle = await open(scratchFile, 'w+');
      logger().debug({ parentFolderId: options.parentFolderId, fileName: options.fileName }, 'Write channel opened');
      return new WriteChannel(handle, scratchDir, scratchFile, options);
    } catch (error) {
      await rm(scratchDir, { recursive: true, force: true });
      throw error;
    }
  }

  private ensureOpen(): void {
    if (!this.open) {
      throw closedChannel();
    }
  }

  async read(_dst: Uint8Array): Promise<number> {
    throw unsupported('Write channel does not support read');
  }

  async write(src: Uint8Array): Promise<number> {
    this.ensureOpen();
    const { bytesWritten } = await this.handle.write(src, 0, src.length, this.offset);
    this.offset += bytesWritten;
    return bytesWritten;
  }

  async position(): Promise<number> {
    this.ensureOpen();
    return this.offset;
  }

  async setPosition(newPosition: number): Promise<this> {
    this.ensureOpen();
    assertPosition(newPosition, 'Position');
    this.offset = newPosition;
    return this;
  }

  async size(): Promise<number> {
    this.ensureOpen();
    const stats = await this.handle.stat();
    return stats.size;
  }

  async truncate(size: number): Promise<this> {
    this.ensureOpen();
    assertPosition(size, 'Size');
    if (size < (await this.size())) {
      await this.handle.truncate(size);
    }
    this.offset = Math.min(this.offset, size);
    return this;
  }

  isOpen(): boolean {
    return this.open;
  }

  /** Id of the entity created on close, or null before a successful close. */
  entityId(): string | null {
    return this.uploadedEntityId;
  }

  async close(): Promise<void> {
    if (!this.open) {
      return;
    }
    this.open = false;

    try {
      await this.handle.close();
      this.uploadedEntityId = await this.options.uploader.uploadFile(
        this.scratchFile,
        this.options.parentFolderId,
        this.options.fileName
      );
    } finally {
      try {
        await rm(this.scratchDir, { recursive: true, force: true });
      } catch (error) {
        logger().warn({ err: error, scratchDir: this.scratchDir }, 'Failed to delete scratch directory');
      }
    }
  }
}
