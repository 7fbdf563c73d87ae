import { existsSync, readFileSync } from 'node:fs';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';

/**
 * Configuration schema with Zod validation.
 * Values come from explicit input first and fall back to environment variables.
 */

export const DEFAULT_ENDPOINT = 'https://repo-prod.prod.sagebase.org';
export const AUTH_TOKEN_SECRET_NAME = 'SYNAPSE_AUTH_TOKEN';

const MIB = 1024 * 1024;

const trueBooleanString = z
  .union([z.boolean(), z.string()])
  .default('true')
  .transform((val) => (typeof val === 'boolean' ? val : val.toLowerCase() === 'true'));

const optionalEnv = (value: string | undefined): string | undefined => {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const configSchema = z.object({
  endpoint: z
    .string()
    .url()
    .default(DEFAULT_ENDPOINT)
    .transform((value) => value.replace(/\/+$/, '')),

  // Only set when the host passes it explicitly; secrets and env are consulted at request time
  authToken: z.string().min(1).optional(),

  http: z.object({
    requestTimeoutMs: z.coerce.number().int().positive().default(60_000),
    downloadTimeoutMs: z.coerce.number().int().positive().default(30 * 60_000),
    partUploadTimeoutMs: z.coerce.number().int().positive().default(10 * 60_000),
  }),

  upload: z
    .object({
      minPartSizeBytes: z.coerce.number().int().positive().default(5 * MIB),
      maxPartSizeBytes: z.coerce.number().int().positive().default(5 * 1024 * MIB),
      maxParts: z.coerce.number().int().positive().default(10_000),
      checksumChunkBytes: z.coerce.number().int().positive().default(2 * MIB),
    })
    .refine((upload) => upload.minPartSizeBytes <= upload.maxPartSizeBytes, {
      message: 'minPartSizeBytes must not exceed maxPartSizeBytes',
    }),

  telemetry: z.object({
    enabled: trueBooleanString,
    serviceName: z.string().default('synapse-fs'),
    serviceVersion: z.string().default('1.0.0'),
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    logFormat: z.enum(['pretty', 'json']).default('json'),
    redactPaths: z
      .array(z.string())
      .default([
        'token',
        '*.token',
        'authToken',
        '*.authToken',
        'authorization',
        '*.authorization',
        'headers.authorization',
        'headers.Authorization',
        'signedHeaders',
        '*.signedHeaders',
      ]),
  }),
});

export type Config = z.infer<typeof configSchema>;

export interface ConfigInput {
  endpoint?: string;
  authToken?: string;
  http?: Partial<Config['http']>;
  upload?: Partial<Config['upload']>;
  telemetry?: Partial<Config['telemetry']>;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Path of a dotenv file merged into `env` before parsing. Existing variables win. */
  envFile?: string;
}

/**
 * Load and validate configuration from explicit input and environment variables
 */
export const loadConfig = (input: ConfigInput = {}, options: LoadConfigOptions = {}): Config => {
  const env = options.env ?? process.env;

  if (options.envFile && existsSync(options.envFile)) {
    const parsed = parseDotenv(readFileSync(options.envFile));
    for (const [name, value] of Object.entries(parsed)) {
      if (env[name] === undefined) {
        env[name] = value;
      }
    }
  }

  try {
    return configSchema.parse({
      endpoint: input.endpoint ?? optionalEnv(env.SYNAPSE_ENDPOINT),
      authToken: optionalEnv(input.authToken),

      http: {
        requestTimeoutMs:
          input.http?.requestTimeoutMs ?? optionalEnv(env.SYNAPSE_REQUEST_TIMEOUT_MS),
        downloadTimeoutMs:
          input.http?.downloadTimeoutMs ?? optionalEnv(env.SYNAPSE_DOWNLOAD_TIMEOUT_MS),
        partUploadTimeoutMs:
          input.http?.partUploadTimeoutMs ?? optionalEnv(env.SYNAPSE_PART_UPLOAD_TIMEOUT_MS),
      },

      upload: {
        minPartSizeBytes:
          input.upload?.minPartSizeBytes ?? optionalEnv(env.SYNAPSE_MIN_PART_SIZE_BYTES),
        maxPartSizeBytes: input.upload?.maxPartSizeBytes,
        maxParts: input.upload?.maxParts,
        checksumChunkBytes: input.upload?.checksumChunkBytes,
      },

      telemetry: {
        enabled: input.telemetry?.enabled ?? optionalEnv(env.SYNAPSE_TELEMETRY_ENABLED),
        serviceName: input.telemetry?.serviceName ?? optionalEnv(env.OTEL_SERVICE_NAME),
        serviceVersion: input.telemetry?.serviceVersion,
        logLevel: input.telemetry?.logLevel ?? optionalEnv(env.SYNAPSE_LOG_LEVEL),
        logFormat: input.telemetry?.logFormat ?? optionalEnv(env.SYNAPSE_LOG_FORMAT),
        redactPaths: input.telemetry?.redactPaths,
      },
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      const details = error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ');
      throw new Error(`Invalid configuration: ${details}`);
    }
    throw error;
  }
};
