import { isSynapsePath, URI_PREFIX, type SynapsePath } from './path';
import { SynapseFileSystemProvider, type NewFileSystemOptions } from './provider';

/**
 * Hook for hosts that resolve URIs to paths themselves. Returns null for anything that is
 * not a `syn://` URI or path, so it can sit in a chain of factories.
 */
export class SynapsePathFactory {
  constructor(
    private readonly provider: SynapseFileSystemProvider = SynapseFileSystemProvider.instance(),
    private readonly options: NewFileSystemOptions = {}
  ) {}

  parseUri(uri: string): SynapsePath | null {
    if (!uri.startsWith(URI_PREFIX)) {
      return null;
    }

    const fileSystem = this.provider.getFileSystem() ?? this.provider.newFileSystem(this.options);
    return fileSystem.getPath(uri);
  }

  toUriString(path: unknown): string | null {
    return isSynapsePath(path) ? path.toUri() : null;
  }
}
