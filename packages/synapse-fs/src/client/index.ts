export { SynapseAuthManager } from './auth';
export type { SecretsProvider, SynapseAuthManagerOptions } from './auth';
export { SynapseClient, toStatusError } from './synapse-client';
export { FILE_ENTITY_TYPE, FOLDER_TYPE, isFileType, isFolderType } from './types';
export type * from './types';
