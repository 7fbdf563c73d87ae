import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { SynapseFsError } from '@/errors';
import type { FileUploader } from '@/upload/contracts';
import { WriteChannel } from './write-channel';

const text = (value: string): Uint8Array => new TextEncoder().encode(value);

describe('WriteChannel', () => {
  let scratchRoot: string;
  let uploaded: Array<{ content: string; parentFolderId: string; fileName?: string }>;
  let uploadFile: Mock<(localFile: string, parentFolderId: string, fileName?: string) => Promise<string>>;
  let uploader: FileUploader;

  beforeEach(async () => {
    scratchRoot = await mkdtemp(join(tmpdir(), 'synapse-write-'));
    uploaded = [];
    uploadFile = vi.fn(async (localFile: string, parentFolderId: string, fileName?: string) => {
      uploaded.push({ content: await readFile(localFile, 'utf8'), parentFolderId, fileName });
      return 'syn500';
    });
    uploader = { uploadFile };
  });

  afterEach(async () => {
    await rm(scratchRoot, { recursive: true, force: true });
  });

  const createChannel = () =>
    WriteChannel.create({ uploader, parentFolderId: 'syn100', fileName: 'out/result.txt', scratchDir: scratchRoot });

  it('uploads the buffered content once on close', async () => {
    const channel = await createChannel();
    await channel.write(text('hello '));
    await channel.write(text('world'));

    expect(uploadFile).not.toHaveBeenCalled();
    await channel.close();
    await channel.close();

    expect(uploadFile).toHaveBeenCalledTimes(1);
    expect(uploaded).toEqual([{ content: 'hello world', parentFolderId: 'syn100', fileName: 'out/result.txt' }]);
    expect(channel.entityId()).toBe('syn500');
    expect(channel.isOpen()).toBe(false);
    await expect(readdir(scratchRoot)).resolves.toEqual([]);
  });

  it('supports random access while open', async () => {
    const channel = await createChannel();
    await channel.write(text('hello world'));
    await expect(channel.position()).resolves.toBe(11);

    await channel.setPosition(0);
    await channel.write(text('J'));
    await expect(channel.position()).resolves.toBe(1);
    await expect(channel.size()).resolves.toBe(11);

    await channel.close();
    expect(uploaded[0]?.content).toBe('Jello world');
  });

  it('truncates without growing and clamps the position', async () => {
    const channel = await createChannel();
    await channel.write(text('hello world'));

    await channel.truncate(100);
    await expect(channel.size()).resolves.toBe(11);

    await channel.truncate(5);
    await expect(channel.size()).resolves.toBe(5);
    await expect(channel.position()).resolves.toBe(5);

    await channel.close();
    expect(uploaded[0]?.content).toBe('hello');
  });

  it('rejects reads and negative positions', async () => {
    const channel = await createChannel();

    await expect(channel.read(new Uint8Array(1))).rejects.toMatchObject({ code: 'UNSUPPORTED_OPERATION' });
    await expect(channel.setPosition(-1)).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    await channel.close();
  });

  it('rejects writes after close', async () => {
    const channel = await createChannel();
    await channel.close();

    await expect(channel.write(text('late'))).rejects.toMatchObject({ code: 'CHANNEL_CLOSED' });
  });

  it('propagates upload failures and still removes the scratch file', async () => {
    uploadFile.mockRejectedValueOnce(new SynapseFsError('boom', 'PART_UPLOAD_FAILED'));
    const channel = await createChannel();
    await channel.write(text('data'));

    await expect(channel.close()).rejects.toMatchObject({ code: 'PART_UPLOAD_FAILED' });
    await expect(readdir(scratchRoot)).resolves.toEqual([]);
    expect(channel.entityId()).toBeNull();

    await channel.close();
    expect(uploadFile).toHaveBeenCalledTimes(1);
  });
});
