export { SynapseFileSystemProvider } from './fs/provider';
export type { AccessMode, CopyEndpoint, DirectoryStream, NewFileSystemOptions, OpenOption } from './fs/provider';
export { SynapseFileSystem } from './fs/filesystem';
export { SynapsePathFactory } from './fs/path-factory';
export {
  EntityPath,
  WriteTargetPath,
  comparePaths,
  formatPath,
  isSynapsePath,
  parsePath,
  pathsEqual,
} from './fs/path';
export type { SynapsePath } from './fs/path';
export { OnceCell } from './fs/once-cell';
export { EOF } from './fs/channel';
export type { SeekableByteChannel } from './fs/channel';
export { ReadChannel } from './fs/read-channel';
export { WriteChannel } from './fs/write-channel';
export type { AttributeMap, SynapseFileAttributes } from './fs/attributes';
export { MultipartUploader } from './upload/uploader';
export type { MultipartUploaderOptions, UploadFileOptions } from './upload/uploader';
export type { UploadLimits, UploadProgress } from './upload/contracts';
export { detectContentType } from './upload/content-type';
export { SynapseAuthManager, SynapseClient, toStatusError } from './client';
export type { SecretsProvider } from './client';
export type {
  AddPartResult,
  ChildEntry,
  EntityLookup,
  EntityMetadata,
  PartPresignedUrl,
  SynapseApi,
  UploadSession,
} from './client/types';
export { loadConfig, DEFAULT_ENDPOINT } from './config';
export type { Config, ConfigInput, LoadConfigOptions } from './config';
export { initTelemetry, getTelemetryStatus, getLogger } from './telemetry';
export { PartUploadError, SynapseFsError, isSynapseFsError } from './errors';
export type { SynapseFsErrorCode } from './errors';
