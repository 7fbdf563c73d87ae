export const FOLDER_TYPE = 'org.sagebionetworks.repo.model.Folder';
export const FILE_ENTITY_TYPE = 'org.sagebionetworks.repo.model.FileEntity';

export interface EntityMetadata {
  id: string;
  name: string;
  concreteType: string;
  dataFileHandleId?: string;
  fileSize?: number;
  createdOn?: string;
  modifiedOn?: string;
  md5?: string;
  contentType?: string;
  versionNumber?: number;
  versionLabel?: string;
  parentId?: string;
}

export type UploadState = 'UPLOADING' | 'COMPLETED';

export interface UploadSession {
  uploadId: string;
  state: UploadState;
  /** Present once the session is COMPLETED, including the dedup short-circuit. */
  resultFileHandleId?: string;
}

export interface PartPresignedUrl {
  partNumber: number;
  uploadPresignedUrl: string;
  signedHeaders: Record<string, string>;
}

export type AddPartState = 'ADD_SUCCESS' | 'ADD_FAILED';

export interface AddPartResult {
  partNumber: number;
  addPartState: AddPartState;
  errorMessage?: string;
}

export interface ChildEntry {
  id: string;
  name: string;
  type: string;
}

export interface CreatedEntity {
  id: string;
}

export interface StartUploadInput {
  fileName: string;
  fileSizeBytes: number;
  contentMD5Hex: string;
  contentType: string;
  partSizeBytes: number;
}

/** Metadata lookup used for display names. */
export interface EntityLookup {
  getEntity(entityId: string, version?: number | null): Promise<EntityMetadata>;
}

/**
 * One method per REST call. The filesystem and the upload engine only talk to the
 * backend through this interface.
 */
export interface SynapseApi extends EntityLookup {
  isFolder(entityId: string): Promise<boolean>;
  createFolder(parentId: string, name: string): Promise<CreatedEntity>;
  listChildren(parentId: string): Promise<ChildEntry[]>;
  getPresignedDownloadUrl(entityId: string, fileHandleId: string): Promise<string>;
  startMultipartUpload(input: StartUploadInput): Promise<UploadSession>;
  getPresignedUploadUrls(uploadId: string, partNumbers: number[]): Promise<PartPresignedUrl[]>;
  confirmPart(uploadId: string, partNumber: number, partMd5Hex: string): Promise<AddPartResult>;
  completeUpload(uploadId: string): Promise<UploadSession>;
  createFileEntity(parentId: string, name: string, fileHandleId: string): Promise<CreatedEntity>;
}

export const isFolderType = (concreteType: string): boolean => concreteType.endsWith('.Folder');

export const isFileType = (concreteType: string): boolean => concreteType.endsWith('.FileEntity');
