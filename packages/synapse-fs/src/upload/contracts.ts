const MIB = 1024 * 1024;

export const DEFAULT_CHECKSUM_CHUNK_BYTES = 2 * MIB;
export const DEFAULT_MIN_PART_SIZE_BYTES = 5 * MIB;
export const DEFAULT_MAX_PART_SIZE_BYTES = 5 * 1024 * MIB;
export const DEFAULT_MAX_PARTS = 10_000;

export interface UploadLimits {
  minPartSizeBytes: number;
  maxPartSizeBytes: number;
  maxParts: number;
  checksumChunkBytes: number;
}

export const DEFAULT_UPLOAD_LIMITS: UploadLimits = {
  minPartSizeBytes: DEFAULT_MIN_PART_SIZE_BYTES,
  maxPartSizeBytes: DEFAULT_MAX_PART_SIZE_BYTES,
  maxParts: DEFAULT_MAX_PARTS,
  checksumChunkBytes: DEFAULT_CHECKSUM_CHUNK_BYTES,
};

export interface UploadProgress {
  uploadedParts: number;
  totalParts: number;
  uploadedBytes: number;
  totalBytes: number;
}

export interface PartDescriptor {
  partNumber: number;
  byteOffset: number;
  byteLength: number;
  md5: string;
  presignedUploadUrl: string;
  signedHeaders: Record<string, string>;
}

/** What a write channel needs from the upload engine. */
export interface FileUploader {
  uploadFile(localFile: string, parentFolderId: string, fileName?: string): Promise<string>;
}
