import type { SynapseApi } from '@/client/types';
import type { Config } from '@/config';
import { unsupported } from '@/errors';
import { getLogger } from '@/telemetry/logger';
import type { MultipartUploader } from '@/upload/uploader';
import { parsePath, SEPARATOR, type SynapsePath } from './path';
import type { SynapseFileSystemProvider } from './provider';

export interface SynapseFileSystemDeps {
  config: Config;
  client: SynapseApi;
  uploader: MultipartUploader;
  /** Parent directory for write-channel scratch files. */
  scratchDir?: string;
}

const logger = () => getLogger('SynapseFileSystem');

/**
 * A filesystem view over Synapse. Closing only flips the open flag; the provider hands
 * out a new instance on the next `newFileSystem` call.
 */
export class SynapseFileSystem {
  readonly separator = SEPARATOR;

  readonly config: Config;

  readonly client: SynapseApi;

  readonly uploader: MultipartUploader;

  readonly scratchDir?: string;

  private open = true;

  constructor(
    readonly provider: SynapseFileSystemProvider,
    deps: SynapseFileSystemDeps
  ) {
    this.config = deps.config;
    this.client = deps.client;
    this.uploader = deps.uploader;
    this.scratchDir = deps.scratchDir;
  }

  getPath(first: string, ...more: string[]): SynapsePath {
    return parsePath([first, ...more].join(SEPARATOR), this.client);
  }

  close(): void {
    if (this.open) {
      logger().debug('Filesystem closed');
    }
    this.open = false;
  }

  isOpen(): boolean {
    return this.open;
  }

  isReadOnly(): boolean {
    return false;
  }

  rootDirectories(): SynapsePath[] {
    return [];
  }

  supportedFileAttributeViews(): Set<string> {
    return new Set(['basic']);
  }

  getPathMatcher(_syntaxAndPattern: string): never {
    throw unsupported('Path matching not supported for Synapse');
  }

  getUserPrincipalLookupService(): never {
    throw unsupported('User principal lookup not supported');
  }

  newWatchService(): never {
    throw unsupported('Watch service not supported for Synapse');
  }
}
