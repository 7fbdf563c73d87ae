import { createHash } from 'node:crypto';
import { open, stat, type FileHandle } from 'node:fs/promises';
import { basename } from 'node:path';
import { isFolderType, type SynapseApi } from '@/client/types';
import { PartUploadError, SynapseFsError } from '@/errors';
import { getLogger } from '@/telemetry/logger';
import { recordEntityAccess, recordUploadBytes } from '@/telemetry/metrics';
import { withSpan } from '@/telemetry/tracer';
import { detectContentType } from './content-type';
import {
  DEFAULT_UPLOAD_LIMITS,
  type FileUploader,
  type PartDescriptor,
  type UploadLimits,
  type UploadProgress,
} from './contracts';

const DEFAULT_PART_UPLOAD_TIMEOUT_MS = 10 * 60_000;

export interface MultipartUploaderOptions {
  limits?: Partial<UploadLimits>;
  partUploadTimeoutMs?: number;
  onProgress?: (progress: UploadProgress) => void;
}

export interface UploadFileOptions {
  onProgress?: (progress: UploadProgress) => void;
}

const logger = () => getLogger('Uploader');

const toHex = (hash: ReturnType<typeof createHash>): string => hash.digest('hex');

const splitFileName = (fileName: string): { folderPath: string; name: string } => {
  const segments = fileName.split('/').filter((segment) => segment.length > 0);
  const name = segments.pop();
  if (!name) {
    throw new SynapseFsError(`Invalid upload file name: '${fileName}'`, 'INVALID_ARGUMENT');
  }
  return { folderPath: segments.join('/'), name };
};

/**
 * Uploads local files to Synapse folders with the multipart upload protocol. Parts are
 * read from disk one at a time and sent sequentially.
 */
export class MultipartUploader implements FileUploader {
  private readonly limits: UploadLimits;

  private readonly partUploadTimeoutMs: number;

  private readonly onProgress?: (progress: UploadProgress) => void;

  constructor(
    private readonly api: SynapseApi,
    options: MultipartUploaderOptions = {}
  ) {
    this.limits = { ...DEFAULT_UPLOAD_LIMITS, ...options.limits };
    this.partUploadTimeoutMs = options.partUploadTimeoutMs ?? DEFAULT_PART_UPLOAD_TIMEOUT_MS;
    this.onProgress = options.onProgress;
  }

  /** MD5 of a file, read in fixed-size chunks. */
  async computeMd5(file: string): Promise<string> {
    const hash = createHash('md5');
    const buffer = Buffer.alloc(this.limits.checksumChunkBytes);
    const handle = await open(file, 'r');
    try {
      for (;;) {
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, null);
        if (bytesRead === 0) {
          break;
        }
        hash.update(buffer.subarray(0, bytesRead));
      }
    } finally {
      await handle.close();
    }
    return toHex(hash);
  }

  computeMd5Bytes(data: Uint8Array): string {
    return toHex(createHash('md5').update(data));
  }

  calculatePartSize(fileSize: number): number {
    const { minPartSizeBytes, maxPartSizeBytes, maxParts } = this.limits;
    let partSize = minPartSizeBytes;

    while (fileSize / partSize > maxParts) {
      partSize *= 2;
      if (partSize > maxPartSizeBytes) {
        throw new SynapseFsError(
          `File size ${fileSize} is too large. Maximum supported file size is ${maxParts * maxPartSizeBytes} bytes.`,
          'FILE_TOO_LARGE'
        );
      }
    }

    return partSize;
  }

  /**
   * Walk `relativePath` below `baseFolderId`, reusing existing folders and creating the
   * missing ones. Returns the id of the deepest folder. Concurrent callers may create
   * duplicate folders.
   */
  async ensureFolderPath(baseFolderId: string, relativePath: string): Promise<string> {
    const segments = relativePath.split('/').filter((segment) => segment.length > 0);
    let currentParentId = baseFolderId;

    for (const folderName of segments) {
      const children = await this.api.listChildren(currentParentId);
      const existing = children.find((child) => child.name === folderName && isFolderType(child.type));
      if (existing) {
        currentParentId = existing.id;
        continue;
      }

      const created = await this.api.createFolder(currentParentId, folderName);
      logger().info({ folderName, folderId: created.id, parentId: currentParentId }, 'Created folder');
      currentParentId = created.id;
    }

    return currentParentId;
  }

  async uploadFile(
    localFile: string,
    parentFolderId: string,
    fileName?: string,
    options: UploadFileOptions = {}
  ): Promise<string> {
    const { folderPath, name } = splitFileName(fileName ?? basename(localFile));
    const startedAt = Date.now();

    return withSpan(
      'synapse.upload',
      { 'synapse.parent_id': parentFolderId, 'synapse.file_name': name },
      async () => {
        try {
          const entityId = await this.runUpload(localFile, parentFolderId, folderPath, name, options);
          recordEntityAccess({ operation: 'write', entityId, result: 'success' }, Date.now() - startedAt);
          return entityId;
        } catch (error) {
          recordEntityAccess(
            { operation: 'write', entityId: parentFolderId, result: 'failure' },
            Date.now() - startedAt
          );
          throw error;
        }
      }
    );
  }

  private async runUpload(
    localFile: string,
    parentFolderId: string,
    folderPath: string,
    name: string,
    options: UploadFileOptions
  ): Promise<string> {
    const fileSize = (await stat(localFile)).size;
    const partSize = this.calculatePartSize(fileSize);

    logger().info({ fileName: name, parentFolderId, fileSize }, 'Uploading file');

    if (!(await this.api.isFolder(parentFolderId))) {
      throw new SynapseFsError(`Cannot write to ${parentFolderId}: not a Folder`, 'INVALID_ARGUMENT');
    }

    const targetFolderId =
      folderPath.length > 0 ? await this.ensureFolderPath(parentFolderId, folderPath) : parentFolderId;

    const md5 = await this.computeMd5(localFile);
    logger().debug({ fileSize, md5, partSize }, 'Prepared upload');

    const session = await this.api.startMultipartUpload({
      fileName: name,
      fileSizeBytes: fileSize,
      contentMD5Hex: md5,
      contentType: detectContentType(name),
      partSizeBytes: partSize,
    });

    if (session.state === 'COMPLETED') {
      logger().info({ uploadId: session.uploadId }, 'Upload already completed (content exists in Synapse)');
      return this.createEntity(targetFolderId, name, session.resultFileHandleId, session.uploadId);
    }

    const totalParts = Math.ceil(fileSize / partSize);
    const onProgress = options.onProgress ?? this.onProgress;
    let uploadedBytes = 0;

    const handle = await open(localFile, 'r');
    try {
      for (let partNumber = 1; partNumber <= totalParts; partNumber += 1) {
        const byteLength = await this.uploadPart(handle, session.uploadId, partNumber, partSize, fileSize);
        uploadedBytes += byteLength;
        recordUploadBytes(byteLength, targetFolderId);
        onProgress?.({ uploadedParts: partNumber, totalParts, uploadedBytes, totalBytes: fileSize });
      }
    } finally {
      await handle.close();
    }

    const completed = await this.api.completeUpload(session.uploadId);
    logger().debug({ uploadId: session.uploadId, fileHandleId: completed.resultFileHandleId }, 'Upload complete');

    return this.createEntity(targetFolderId, name, completed.resultFileHandleId, session.uploadId);
  }

  private async createEntity(
    parentId: string,
    name: string,
    fileHandleId: string | undefined,
    uploadId: string
  ): Promise<string> {
    if (!fileHandleId) {
      throw new SynapseFsError(`Upload ${uploadId} completed without a file handle`, 'REQUEST_FAILED');
    }

    const entity = await this.api.createFileEntity(parentId, name, fileHandleId);
    logger().info({ entityId: entity.id, parentId }, 'Created FileEntity');
    return entity.id;
  }

  private async describePart(
    handle: FileHandle,
    uploadId: string,
    partNumber: number,
    partSize: number,
    fileSize: number
  ): Promise<{ part: PartDescriptor; data: Buffer }> {
    const urls = await this.api.getPresignedUploadUrls(uploadId, [partNumber]);
    const presigned = urls.find((entry) => entry.partNumber === partNumber) ?? urls[0];
    if (!presigned) {
      throw new SynapseFsError(`Failed to get presigned URL for part ${partNumber}`, 'REQUEST_FAILED');
    }

    const byteOffset = (partNumber - 1) * partSize;
    const byteLength = Math.min(partSize, fileSize - byteOffset);
    const data = await readFully(handle, byteOffset, byteLength);

    return {
      part: {
        partNumber,
        byteOffset,
        byteLength,
        md5: this.computeMd5Bytes(data),
        presignedUploadUrl: presigned.uploadPresignedUrl,
        signedHeaders: presigned.signedHeaders,
      },
      data,
    };
  }

  private async uploadPart(
    handle: FileHandle,
    uploadId: string,
    partNumber: number,
    partSize: number,
    fileSize: number
  ): Promise<number> {
    const { part, data } = await this.describePart(handle, uploadId, partNumber, partSize, fileSize);

    logger().debug({ partNumber, byteOffset: part.byteOffset, byteLength: part.byteLength }, 'Uploading part');

    let response: Response;
    try {
      response = await fetch(part.presignedUploadUrl, {
        method: 'PUT',
        headers: part.signedHeaders,
        body: data,
        signal: AbortSignal.timeout(this.partUploadTimeoutMs),
      });
    } catch (error) {
      throw new PartUploadError(`Failed to upload part ${partNumber}`, partNumber, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text();
      throw new PartUploadError(
        `Failed to upload part ${partNumber}: HTTP ${response.status} - ${body}`,
        partNumber,
        { status: response.status }
      );
    }

    await response.body?.cancel();

    const confirmation = await this.api.confirmPart(uploadId, partNumber, part.md5);
    if (confirmation.addPartState !== 'ADD_SUCCESS') {
      throw new PartUploadError(
        `Synapse rejected part ${partNumber}: ${confirmation.errorMessage ?? confirmation.addPartState}`,
        partNumber
      );
    }

    return part.byteLength;
  }
}

const readFully = async (
  handle: FileHandle,
  position: number,
  length: number
): Promise<Buffer> => {
  const buffer = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(buffer, filled, length - filled, position + filled);
    if (bytesRead === 0) {
      throw new SynapseFsError(`Unexpected end of file at byte ${position + filled}`, 'REQUEST_FAILED');
    }
    filled += bytesRead;
  }
  return buffer;
};
