/**
 * @fileoverview Loads and validates application configuration from the
 * environment (and an optional `.env` file). Imported once at startup; every
 * other module reads the exported `config` object.
 * @module src/config/index
 */
import dotenv from 'dotenv';
import { homedir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { SourceMode } from '@/services/motif/types.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

dotenv.config();

const PACKAGE_ROOT = fileURLToPath(new URL('../../', import.meta.url));
const DEFAULT_DATA_DIR = path.join(PACKAGE_ROOT, 'data');

/** Thirty days: the fixed lifetime of every cache entry. */
export const CACHE_TTL_SECONDS = 2_592_000;

const expandHome = (value: string): string =>
  value === '~' || value.startsWith('~/')
    ? path.join(homedir(), value.slice(1))
    : value;

const LogLevelSchema = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'crit',
]);

const EnvSchema = z.object({
  MCP_SERVER_NAME: z.string().min(1).default('rna-motif-resolver'),
  MCP_SERVER_VERSION: z.string().min(1).default('1.0.0'),
  MCP_LOG_LEVEL: LogLevelSchema.default('info'),
  MOTIF_DATA_DIR: z.string().min(1).optional(),
  MOTIF_USER_ANNOTATIONS_DIR: z.string().min(1).optional(),
  MOTIF_CACHE_DIR: z.string().min(1).optional(),
  MOTIF_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MOTIF_PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(45000),
  MOTIF_DEFAULT_SOURCE_MODE: z
    .nativeEnum(SourceMode)
    .refine((mode) => mode !== SourceMode.USER, {
      message: 'user mode needs a tool and cannot be the default',
    })
    .default(SourceMode.AUTO),
  MOTIF_ATLAS_VERSION: z.string().min(1).optional(),
  BGSU_API_URL: z
    .string()
    .url()
    .default('https://rna.bgsu.edu/rna3dhub/loops/download'),
  PDBE_API_URL: z.string().url().default('https://www.ebi.ac.uk/pdbe/api'),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface AppConfig {
  serverName: string;
  serverVersion: string;
  logLevel: LogLevel;
  dataDir: string;
  userAnnotationsDir: string;
  cacheDir: string;
  cacheTtlSeconds: number;
  requestTimeoutMs: number;
  providerTimeoutMs: number;
  defaultSourceMode: SourceMode;
  atlasVersion?: string | undefined;
  bgsuApiUrl: string;
  pdbeApiUrl: string;
}

/**
 * Builds an {@link AppConfig} from an environment record.
 * @throws {McpError} ConfigurationError when a variable fails validation.
 */
export function parseConfig(
  env: Record<string, string | undefined>,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new McpError(
      JsonRpcErrorCode.ConfigurationError,
      `Invalid environment configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
  }

  const vars = parsed.data;
  const dataDir = path.resolve(
    expandHome(vars.MOTIF_DATA_DIR ?? DEFAULT_DATA_DIR),
  );

  return {
    serverName: vars.MCP_SERVER_NAME,
    serverVersion: vars.MCP_SERVER_VERSION,
    logLevel: vars.MCP_LOG_LEVEL,
    dataDir,
    userAnnotationsDir: path.resolve(
      expandHome(
        vars.MOTIF_USER_ANNOTATIONS_DIR ??
          path.join(dataDir, 'user_annotations'),
      ),
    ),
    cacheDir: path.resolve(
      expandHome(vars.MOTIF_CACHE_DIR ?? '~/.rna_motif_cache'),
    ),
    cacheTtlSeconds: CACHE_TTL_SECONDS,
    requestTimeoutMs: vars.MOTIF_REQUEST_TIMEOUT_MS,
    providerTimeoutMs: vars.MOTIF_PROVIDER_TIMEOUT_MS,
    defaultSourceMode: vars.MOTIF_DEFAULT_SOURCE_MODE,
    atlasVersion: vars.MOTIF_ATLAS_VERSION,
    bgsuApiUrl: vars.BGSU_API_URL.replace(/\/+$/, ''),
    pdbeApiUrl: vars.PDBE_API_URL.replace(/\/+$/, ''),
  };
}

export const config: AppConfig = parseConfig(process.env);
