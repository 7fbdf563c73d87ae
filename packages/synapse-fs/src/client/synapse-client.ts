import type { z } from 'zod';
import type { Config } from '@/config';
import { SynapseFsError } from '@/errors';
import { getLogger } from '@/telemetry/logger';
import type { SynapseAuthManager } from './auth';
import {
  addPartResultSchema,
  childrenPageSchema,
  createdEntitySchema,
  entityMetadataSchema,
  presignedUrlBatchSchema,
  presignedUrlJsonSchema,
  uploadStatusSchema,
} from './schemas';
import {
  FILE_ENTITY_TYPE,
  FOLDER_TYPE,
  isFolderType,
  type AddPartResult,
  type ChildEntry,
  type CreatedEntity,
  type EntityMetadata,
  type PartPresignedUrl,
  type StartUploadInput,
  type SynapseApi,
  type UploadSession,
} from './types';

type HttpMethod = 'GET' | 'POST' | 'PUT';

const MULTIPART_REQUEST_TYPE = 'org.sagebionetworks.repo.model.file.MultipartUploadRequest';

const REDIRECT_STATUSES = new Set([301, 302, 307]);

const logger = () => getLogger('SynapseClient');

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Translate a non-success response into the filesystem error taxonomy.
 * Returns null for 200 and 201.
 */
export const toStatusError = (status: number, body: string, url: string): SynapseFsError | null => {
  switch (status) {
    case 200:
    case 201:
      return null;
    case 401:
      return new SynapseFsError(
        'Synapse authentication failed. Your token may be invalid or expired. ' +
          'Refresh the SYNAPSE_AUTH_TOKEN secret or environment variable.',
        'AUTHENTICATION_FAILED',
        { status }
      );
    case 403:
      return new SynapseFsError(
        `Access denied to ${url}. You don't have permission to access this Synapse entity.`,
        'ACCESS_DENIED',
        { status }
      );
    case 404:
      return new SynapseFsError(
        `Synapse entity not found at ${url}. The entity may not exist or you may not have access.`,
        'NOT_FOUND',
        { status }
      );
    default:
      return new SynapseFsError(`Synapse API error (HTTP ${status}): ${body}`, 'REQUEST_FAILED', { status });
  }
};

export class SynapseClient implements SynapseApi {
  constructor(
    private readonly config: Pick<Config, 'endpoint' | 'http'>,
    private readonly auth: SynapseAuthManager
  ) {}

  private async send(
    method: HttpMethod,
    path: string,
    body?: unknown,
    redirect?: RequestInit['redirect']
  ): Promise<Response> {
    const url = `${this.config.endpoint}${path}`;
    const headers: Record<string, string> = {
      Authorization: await this.auth.authorizationHeader(),
      Accept: 'application/json',
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    logger().debug({ method, url }, 'Synapse request');

    try {
      return await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        redirect,
        signal: AbortSignal.timeout(this.config.http.requestTimeoutMs),
      });
    } catch (error) {
      throw new SynapseFsError(`Synapse request ${method} ${url} failed: ${errorMessage(error)}`, 'REQUEST_FAILED', {
        cause: error,
      });
    }
  }

  private async readText(response: Response, url: string): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw new SynapseFsError(`Failed to read response body from ${url}: ${errorMessage(error)}`, 'REQUEST_FAILED', {
        cause: error,
        status: response.status,
      });
    }
  }

  private decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string, url: string): T {
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new SynapseFsError(`Invalid JSON in response from ${url}`, 'REQUEST_FAILED', { cause: error });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const details = parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ');
      throw new SynapseFsError(`Unexpected response from ${url}: ${details}`, 'REQUEST_FAILED', {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T> {
    const response = await this.send(method, path, body);
    const url = `${this.config.endpoint}${path}`;
    const text = await this.readText(response, url);

    const statusError = toStatusError(response.status, text, url);
    if (statusError) {
      throw statusError;
    }

    return this.decode(schema, text, url);
  }

  async getEntity(entityId: string, version?: number | null): Promise<EntityMetadata> {
    const path =
      version === undefined || version === null
        ? `/repo/v1/entity/${entityId}`
        : `/repo/v1/entity/${entityId}/version/${version}`;
    return this.request('GET', path, entityMetadataSchema);
  }

  async isFolder(entityId: string): Promise<boolean> {
    const entity = await this.getEntity(entityId);
    return isFolderType(entity.concreteType);
  }

  async createFolder(parentId: string, name: string): Promise<CreatedEntity> {
    return this.request('POST', '/repo/v1/entity', createdEntitySchema, {
      concreteType: FOLDER_TYPE,
      name,
      parentId,
    });
  }

  async listChildren(parentId: string): Promise<ChildEntry[]> {
    const children: ChildEntry[] = [];
    let nextPageToken: string | undefined;

    do {
      const page = await this.request('POST', '/repo/v1/entity/children', childrenPageSchema, {
        parentId,
        includeTypes: ['folder', 'file'],
        ...(nextPageToken ? { nextPageToken } : {}),
      });
      children.push(...page.page);
      nextPageToken = page.nextPageToken ?? undefined;
    } while (nextPageToken);

    return children;
  }

  async getPresignedDownloadUrl(entityId: string, fileHandleId: string): Promise<string> {
    const query = new URLSearchParams({
      redirect: 'false',
      fileAssociateType: 'FileEntity',
      fileAssociateId: entityId,
    });
    const path = `/file/v1/file/${fileHandleId}?${query.toString()}`;
    const url = `${this.config.endpoint}${path}`;
    const response = await this.send('GET', path, undefined, 'manual');

    if (REDIRECT_STATUSES.has(response.status)) {
      const location = response.headers.get('Location');
      if (!location) {
        throw new SynapseFsError(`Redirect response without Location header from ${url}`, 'REQUEST_FAILED', {
          status: response.status,
        });
      }
      return location;
    }

    const text = (await this.readText(response, url)).trim();
    const statusError = toStatusError(response.status, text, url);
    if (statusError) {
      throw statusError;
    }

    // Synapse answers with the bare URL; older deployments wrap it in JSON
    if (text.startsWith('http')) {
      return text;
    }
    return this.decode(presignedUrlJsonSchema, text, url).preSignedURL;
  }

  async startMultipartUpload(input: StartUploadInput): Promise<UploadSession> {
    return this.request('POST', '/file/v1/file/multipart', uploadStatusSchema, {
      concreteType: MULTIPART_REQUEST_TYPE,
      ...input,
    });
  }

  async getPresignedUploadUrls(uploadId: string, partNumbers: number[]): Promise<PartPresignedUrl[]> {
    const batch = await this.request(
      'POST',
      `/file/v1/file/multipart/${uploadId}/presigned/url/batch`,
      presignedUrlBatchSchema,
      { uploadId, partNumbers }
    );
    return batch.partPresignedUrls;
  }

  async confirmPart(uploadId: string, partNumber: number, partMd5Hex: string): Promise<AddPartResult> {
    const query = new URLSearchParams({ partMD5Hex: partMd5Hex });
    return this.request(
      'PUT',
      `/file/v1/file/multipart/${uploadId}/add/${partNumber}?${query.toString()}`,
      addPartResultSchema
    );
  }

  async completeUpload(uploadId: string): Promise<UploadSession> {
    return this.request('PUT', `/file/v1/file/multipart/${uploadId}/complete`, uploadStatusSchema);
  }

  async createFileEntity(parentId: string, name: string, fileHandleId: string): Promise<CreatedEntity> {
    return this.request('POST', '/repo/v1/entity', createdEntitySchema, {
      concreteType: FILE_ENTITY_TYPE,
      name,
      parentId,
      dataFileHandleId: fileHandleId,
    });
  }
}
