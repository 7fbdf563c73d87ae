import { z } from 'zod';

// Synapse responses carry many more fields; zod strips what is not listed here.

export const entityMetadataSchema = z.object({
  id: z.string(),
  name: z.string(),
  concreteType: z.string(),
  dataFileHandleId: z.string().optional(),
  fileSize: z.number().nonnegative().optional(),
  createdOn: z.string().optional(),
  modifiedOn: z.string().optional(),
  md5: z.string().optional(),
  contentType: z.string().optional(),
  versionNumber: z.number().int().optional(),
  versionLabel: z.string().optional(),
  parentId: z.string().optional(),
});

export const createdEntitySchema = z.object({
  id: z.string(),
});

export const childrenPageSchema = z.object({
  page: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        type: z.string(),
      })
    )
    .default([]),
  nextPageToken: z.string().nullish(),
});

export const uploadStatusSchema = z.object({
  uploadId: z.string(),
  state: z.enum(['UPLOADING', 'COMPLETED']),
  resultFileHandleId: z.string().optional(),
});

export const presignedUrlBatchSchema = z.object({
  partPresignedUrls: z
    .array(
      z.object({
        partNumber: z.number().int().positive(),
        uploadPresignedUrl: z.string().url(),
        signedHeaders: z.record(z.string()).default({}),
      })
    )
    .default([]),
});

export const addPartResultSchema = z.object({
  partNumber: z.number().int().positive(),
  addPartState: z.enum(['ADD_SUCCESS', 'ADD_FAILED']),
  errorMessage: z.string().optional(),
});

export const presignedUrlJsonSchema = z.object({
  preSignedURL: z.string().url(),
});
