import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '@/config';
import { FakeSynapseApi } from '@/test-support/fake-synapse-api';
import { EOF } from './channel';
import { SynapseFileSystemProvider } from './provider';
import { ReadChannel } from './read-channel';
import { WriteChannel } from './write-channel';

const config = loadConfig({ telemetry: { logLevel: 'silent' } }, { env: {} });

describe('SynapseFileSystemProvider', () => {
  const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();
  let tempDir: string;
  let api: FakeSynapseApi;
  let provider: SynapseFileSystemProvider;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'synapse-provider-'));
    api = new FakeSynapseApi()
      .addFolder('syn100', 'project')
      .addFile('syn200', 'hello.txt', {
        fileSize: 13,
        dataFileHandleId: 'fh-200',
        parentId: 'syn100',
      })
      .addFile('syn300', 'pending.txt', { parentId: 'syn100' });
    provider = new SynapseFileSystemProvider();
    provider.newFileSystem({ config, client: api, scratchDir: tempDir });

    fetchMock.mockReset();
    fetchMock.mockImplementation(async (_input, init) =>
      init?.method === 'PUT' ? new Response(null, { status: 200 }) : new Response('Hello, World!')
    );
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('filesystem lifecycle', () => {
    it('returns the open filesystem until it is closed', () => {
      const first = provider.newFileSystem({ config, client: api });
      expect(provider.newFileSystem({ config, client: new FakeSynapseApi() })).toBe(first);

      first.close();
      const second = provider.newFileSystem({ config, client: api });
      expect(second).not.toBe(first);
      expect(second.isOpen()).toBe(true);
      expect(provider.getFileSystem()).toBe(second);
    });

    it('exposes a singleton provider', () => {
      expect(SynapseFileSystemProvider.instance()).toBe(SynapseFileSystemProvider.instance());
      expect(provider.scheme).toBe('syn');
    });

    it('builds paths that resolve display names through the client', async () => {
      const path = provider.getPath('syn://syn200');

      await expect(path.displayName()).resolves.toBe('hello.txt');
      expect(api.callsTo('getEntity')).toEqual([['syn200', null]]);
    });
  });

  describe('newByteChannel', () => {
    it('opens a read channel sized from metadata', async () => {
      const channel = await provider.newByteChannel(provider.getPath('syn://syn200'));

      expect(channel).toBeInstanceOf(ReadChannel);
      await expect(channel.size()).resolves.toBe(13);
      expect(api.callsTo('getPresignedDownloadUrl')).toEqual([['syn200', 'fh-200']]);

      const buffer = new Uint8Array(32);
      const count = await channel.read(buffer);
      expect(new TextDecoder().decode(buffer.subarray(0, count))).toBe('Hello, World!');
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://storage.test/download/fh-200');
      await channel.close();
    });

    it('refuses to read folders before asking for a download URL', async () => {
      await expect(provider.newByteChannel(provider.getPath('syn://syn100'))).rejects.toMatchObject({
        code: 'NOT_A_FILE',
      });
      expect(api.callsTo('getPresignedDownloadUrl')).toHaveLength(0);
    });

    it('requires a file handle', async () => {
      await expect(provider.newByteChannel(provider.getPath('syn://syn300'))).rejects.toMatchObject({
        code: 'NO_FILE_HANDLE',
      });
    });

    it('requires a write target for write intent', async () => {
      await expect(provider.newByteChannel(provider.getPath('syn://syn100'), ['write'])).rejects.toMatchObject({
        code: 'INVALID_ARGUMENT',
      });
      await expect(provider.newByteChannel(provider.getPath('syn://syn100'), ['create-new'])).rejects.toMatchObject({
        code: 'INVALID_ARGUMENT',
      });
    });

    it('uploads what is written through a write channel', async () => {
      const channel = await provider.newByteChannel(provider.getPath('syn://syn100/out.txt'), ['write', 'create']);
      expect(channel).toBeInstanceOf(WriteChannel);

      await channel.write(new TextEncoder().encode('Hello, World!'));
      await channel.close();

      expect(api.callsTo('createFileEntity')).toEqual([['syn100', 'out.txt', 'fh-new']]);
    });
  });

  describe('copy', () => {
    it('downloads a Synapse file to a local path', async () => {
      const target = join(tempDir, 'downloaded.txt');

      await provider.copy(provider.getPath('syn://syn200'), target);

      await expect(readFile(target, 'utf8')).resolves.toBe('Hello, World!');
    });

    it('uploads a local file to a write target', async () => {
      const source = join(tempDir, 'local.txt');
      await writeFile(source, 'Hello, World!');

      await provider.copy(source, provider.getPath('syn://syn100/results/hello.txt'));

      expect(api.callsTo('createFolder')).toEqual([['syn100', 'results']]);
      expect(api.callsTo('createFileEntity')).toEqual([['syn1000', 'hello.txt', 'fh-new']]);
    });

    it('uses the local file name when the target is a folder', async () => {
      const source = join(tempDir, 'local.txt');
      await writeFile(source, 'Hello, World!');

      await provider.copy(source, provider.getPath('syn://syn100'));

      expect(api.callsTo('createFileEntity')).toEqual([['syn100', 'local.txt', 'fh-new']]);
    });

    it('rejects copies between Synapse paths', async () => {
      await expect(
        provider.copy(provider.getPath('syn://syn200'), provider.getPath('syn://syn100/copy.txt'))
      ).rejects.toMatchObject({ code: 'UNSUPPORTED_OPERATION' });
    });

    it('rejects copies between local paths', async () => {
      await expect(provider.copy(join(tempDir, 'a'), join(tempDir, 'b'))).rejects.toMatchObject({
        code: 'INVALID_ARGUMENT',
      });
    });
  });

  describe('directory operations', () => {
    it('accepts existing folders only', async () => {
      await expect(provider.createDirectory(provider.getPath('syn://syn100'))).resolves.toBeUndefined();
      await expect(provider.createDirectory(provider.getPath('syn://syn200'))).rejects.toMatchObject({
        code: 'NOT_A_FOLDER',
      });
    });

    it('lists nothing', async () => {
      const stream = provider.newDirectoryStream(provider.getPath('syn://syn100'));
      const entries: string[] = [];
      for await (const entry of stream) {
        entries.push(entry.entityId);
      }
      stream.close();

      expect(entries).toEqual([]);
    });

    it('ignores deletes and rejects moves', async () => {
      await expect(provider.delete(provider.getPath('syn://syn200'))).resolves.toBeUndefined();
      await expect(
        provider.move(provider.getPath('syn://syn200'), provider.getPath('syn://syn100/moved.txt'))
      ).rejects.toMatchObject({ code: 'UNSUPPORTED_OPERATION' });
      expect(api.calls).toHaveLength(0);
    });
  });

  describe('checkAccess', () => {
    it('reports write targets as missing', async () => {
      await expect(provider.checkAccess(provider.getPath('syn://syn100/new.txt'), ['read'])).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });

    it('requires a folder for write access', async () => {
      await expect(provider.checkAccess(provider.getPath('syn://syn100'), ['write'])).resolves.toBeUndefined();
      await expect(provider.checkAccess(provider.getPath('syn://syn200'), ['read', 'write'])).rejects.toMatchObject({
        code: 'NOT_A_FOLDER',
      });
    });

    it('requires the entity to exist for read access', async () => {
      await expect(provider.checkAccess(provider.getPath('syn://syn200'), ['read'])).resolves.toBeUndefined();
      await expect(provider.checkAccess(provider.getPath('syn://syn999'))).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });
  });

  describe('attributes', () => {
    it('reads file attributes from metadata', async () => {
      api.addFile('syn400', 'data.csv', {
        fileSize: 2048,
        dataFileHandleId: 'fh-400',
      });
      const entity = api.entities.get('syn400');
      if (entity) {
        entity.modifiedOn = '2024-03-01T10:00:00.000Z';
        entity.createdOn = 'not a date';
      }

      const attributes = await provider.readAttributes(provider.getPath('syn://syn400'));

      expect(attributes).toMatchObject({
        entityId: 'syn400',
        name: 'data.csv',
        size: 2048,
        isRegularFile: true,
        isDirectory: false,
        isSymbolicLink: false,
        isOther: false,
        fileKey: 'syn400',
      });
      expect(attributes.lastModifiedTime.toISOString()).toBe('2024-03-01T10:00:00.000Z');
      expect(attributes.creationTime.getTime()).toBe(0);
    });

    it('treats folders as directories without size', async () => {
      const attributes = await provider.readAttributes(provider.getPath('syn://syn100'));

      expect(attributes.isDirectory).toBe(true);
      expect(attributes.size).toBe(0);
      expect(attributes.lastModifiedTime.getTime()).toBe(0);
    });

    it('selects attributes by name', async () => {
      const path = provider.getPath('syn://syn200');

      await expect(provider.readAttributeMap(path, 'basic:size,isDirectory')).resolves.toEqual({
        size: 13,
        isDirectory: false,
      });
      await expect(provider.readAttributeMap(path, 'isRegularFile')).resolves.toEqual({ isRegularFile: true });
      await expect(provider.readAttributeMap(path, '*')).resolves.toEqual({
        size: 13,
        lastModifiedTime: new Date(0),
        isDirectory: false,
        isRegularFile: true,
        isSymbolicLink: false,
        isOther: false,
      });
      await expect(provider.readAttributeMap(path, 'posix:*')).rejects.toMatchObject({
        code: 'UNSUPPORTED_OPERATION',
      });
    });

    it('does not read attributes of write targets', async () => {
      await expect(provider.readAttributes(provider.getPath('syn://syn100/new.txt'))).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });

    it('rejects attribute updates', async () => {
      await expect(provider.setAttribute(provider.getPath('syn://syn200'), 'basic:size', 1)).rejects.toMatchObject({
        code: 'UNSUPPORTED_OPERATION',
      });
    });
  });

  it('compares paths by identity', () => {
    expect(provider.isSameFile(provider.getPath('syn://syn1.2'), provider.getPath('syn1.2'))).toBe(true);
    expect(provider.isSameFile(provider.getPath('syn://syn1'), provider.getPath('syn://syn1/a'))).toBe(false);
    expect(provider.isHidden(provider.getPath('syn://syn1'))).toBe(false);
  });

  it('drains downloads until EOF', async () => {
    const channel = await provider.newByteChannel(provider.getPath('syn://syn200'));
    const buffer = new Uint8Array(5);
    const counts: number[] = [];
    for (let count = await channel.read(buffer); count !== EOF; count = await channel.read(buffer)) {
      counts.push(count);
    }
    await channel.close();

    expect(counts).toEqual([5, 5, 3]);
  });
});
