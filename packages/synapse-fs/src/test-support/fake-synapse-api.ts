import {
  FILE_ENTITY_TYPE,
  FOLDER_TYPE,
  isFolderType,
  type AddPartResult,
  type AddPartState,
  type ChildEntry,
  type CreatedEntity,
  type EntityMetadata,
  type PartPresignedUrl,
  type StartUploadInput,
  type SynapseApi,
  type UploadSession,
  type UploadState,
} from '@/client/types';
import { SynapseFsError } from '@/errors';

export interface RecordedCall {
  method: keyof SynapseApi;
  args: unknown[];
}

/** In-memory Synapse backend. Ids of created entities start at syn1000. */
export class FakeSynapseApi implements SynapseApi {
  readonly entities = new Map<string, EntityMetadata>();

  readonly children = new Map<string, ChildEntry[]>();

  readonly calls: RecordedCall[] = [];

  uploadState: UploadState = 'UPLOADING';

  addPartState: AddPartState = 'ADD_SUCCESS';

  private nextId = 1000;

  addFolder(id: string, name: string, parentId?: string): this {
    this.putEntity({ id, name, concreteType: FOLDER_TYPE, parentId });
    return this;
  }

  addFile(
    id: string,
    name: string,
    options: { fileSize?: number; dataFileHandleId?: string; parentId?: string } = {}
  ): this {
    this.putEntity({ id, name, concreteType: FILE_ENTITY_TYPE, ...options });
    return this;
  }

  callsTo(method: keyof SynapseApi): unknown[][] {
    return this.calls.filter((call) => call.method === method).map((call) => call.args);
  }

  private putEntity(entity: EntityMetadata): void {
    this.entities.set(entity.id, entity);
    if (entity.parentId) {
      const siblings = this.children.get(entity.parentId) ?? [];
      siblings.push({ id: entity.id, name: entity.name, type: entity.concreteType });
      this.children.set(entity.parentId, siblings);
    }
  }

  private record(method: keyof SynapseApi, ...args: unknown[]): void {
    this.calls.push({ method, args });
  }

  private newId(): string {
    const id = `syn${this.nextId}`;
    this.nextId += 1;
    return id;
  }

  async getEntity(entityId: string, version?: number | null): Promise<EntityMetadata> {
    this.record('getEntity', entityId, version);
    const entity = this.entities.get(entityId);
    if (!entity) {
      throw new SynapseFsError(`Synapse entity not found: ${entityId}`, 'NOT_FOUND', { status: 404 });
    }
    return entity;
  }

  async isFolder(entityId: string): Promise<boolean> {
    this.record('isFolder', entityId);
    const entity = this.entities.get(entityId);
    if (!entity) {
      throw new SynapseFsError(`Synapse entity not found: ${entityId}`, 'NOT_FOUND', { status: 404 });
    }
    return isFolderType(entity.concreteType);
  }

  async createFolder(parentId: string, name: string): Promise<CreatedEntity> {
    this.record('createFolder', parentId, name);
    const id = this.newId();
    this.putEntity({ id, name, concreteType: FOLDER_TYPE, parentId });
    return { id };
  }

  async listChildren(parentId: string): Promise<ChildEntry[]> {
    this.record('listChildren', parentId);
    return [...(this.children.get(parentId) ?? [])];
  }

  async getPresignedDownloadUrl(entityId: string, fileHandleId: string): Promise<string> {
    this.record('getPresignedDownloadUrl', entityId, fileHandleId);
    return `https://storage.test/download/${fileHandleId}`;
  }

  async startMultipartUpload(input: StartUploadInput): Promise<UploadSession> {
    this.record('startMultipartUpload', input);
    return this.uploadState === 'COMPLETED'
      ? { uploadId: 'upload-1', state: 'COMPLETED', resultFileHandleId: 'fh-existing' }
      : { uploadId: 'upload-1', state: 'UPLOADING' };
  }

  async getPresignedUploadUrls(uploadId: string, partNumbers: number[]): Promise<PartPresignedUrl[]> {
    this.record('getPresignedUploadUrls', uploadId, partNumbers);
    return partNumbers.map((partNumber) => ({
      partNumber,
      uploadPresignedUrl: `https://storage.test/upload/${uploadId}/${partNumber}`,
      signedHeaders: { 'Content-Type': 'application/octet-stream' },
    }));
  }

  async confirmPart(uploadId: string, partNumber: number, partMd5Hex: string): Promise<AddPartResult> {
    this.record('confirmPart', uploadId, partNumber, partMd5Hex);
    return this.addPartState === 'ADD_SUCCESS'
      ? { partNumber, addPartState: 'ADD_SUCCESS' }
      : { partNumber, addPartState: 'ADD_FAILED', errorMessage: 'checksum mismatch' };
  }

  async completeUpload(uploadId: string): Promise<UploadSession> {
    this.record('completeUpload', uploadId);
    return { uploadId, state: 'COMPLETED', resultFileHandleId: 'fh-new' };
  }

  async createFileEntity(parentId: string, name: string, fileHandleId: string): Promise<CreatedEntity> {
    this.record('createFileEntity', parentId, name, fileHandleId);
    const id = this.newId();
    this.putEntity({ id, name, concreteType: FILE_ENTITY_TYPE, parentId, dataFileHandleId: fileHandleId });
    return { id };
  }
}
