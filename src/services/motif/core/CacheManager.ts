/**
 * @fileoverview Disk cache for remote provider responses.
 *
 * One JSON file per key under the cache directory. Entries expire after a
 * fixed TTL; an expired, unreadable or invalid entry reads as a miss and stays
 * on disk until it is overwritten, invalidated or purged. Writes go to a
 * temporary file that is renamed into place, so readers never see a partial
 * entry.
 * @module src/services/motif/core/CacheManager
 */
import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { inject, injectable } from 'tsyringe';
import { z } from 'zod';

import { CacheOptions } from '@/container/tokens.js';
import { CACHE_TTL_SECONDS } from '@/config/index.js';
import { JsonRpcErrorCode, McpError, errorMessage } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';
import { AnnotationResultSchema } from '../schemas.js';
import type { AnnotationResult } from '../types.js';
import { normalizePdbId } from './motifMap.js';

export interface CacheManagerOptions {
  cacheDir: string;
  /** Defaults to {@link CACHE_TTL_SECONDS}. */
  ttlSeconds?: number | undefined;
  /** Epoch milliseconds; injectable for tests. */
  now?: (() => number) | undefined;
}

export interface CacheEntryMeta {
  /** Structure the entry belongs to; informational only. */
  pdbId?: string | undefined;
}

export interface CacheStats {
  cacheDir: string;
  totalEntries: number;
  expiredEntries: number;
  totalBytes: number;
  byProvider: Record<string, number>;
}

const CacheEntrySchema = z.object({
  key: z.string(),
  providerId: z.string(),
  pdbId: z.string().optional(),
  createdAt: z.string(),
  ttlSeconds: z.number().positive(),
  payload: AnnotationResultSchema,
});

type CacheEntry = z.infer<typeof CacheEntrySchema>;

const ENTRY_SUFFIX = '.json';
const TEMP_SUFFIX = '.tmp';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

@injectable()
export class CacheManager {
  private readonly cacheDir: string;
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  constructor(@inject(CacheOptions) options: CacheManagerOptions) {
    this.cacheDir = options.cacheDir;
    this.ttlSeconds = options.ttlSeconds ?? CACHE_TTL_SECONDS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Derives the cache key for a logical query. Provider id and PDB id are
   * normalized and parameters are sorted, so equal queries always share a key.
   */
  static deriveKey(
    providerId: string,
    pdbId: string,
    params: Readonly<Record<string, string | number | boolean>> = {},
  ): string {
    const sortedParams = Object.keys(params)
      .sort()
      .map((name) => [name, params[name]]);
    const canonical = JSON.stringify([
      providerId.trim().toLowerCase(),
      normalizePdbId(pdbId),
      sortedParams,
    ]);
    return createHash('sha256').update(canonical).digest('hex');
  }

  get directory(): string {
    return this.cacheDir;
  }

  /**
   * Returns the cached result for `key`, or `undefined` on a miss. Absent,
   * expired, unparsable and schema-invalid entries are all misses.
   */
  async get(
    key: string,
    context?: RequestContext,
  ): Promise<AnnotationResult | undefined> {
    const entry = await this.readEntry(this.entryPath(key), context);
    if (!entry) return undefined;

    if (entry.key !== key) {
      logger.debug('Cache entry key mismatch, treating as miss', {
        ...context,
        key,
        storedKey: entry.key,
      });
      return undefined;
    }

    if (this.isExpired(entry)) {
      logger.debug('Cache entry expired', {
        ...context,
        key,
        providerId: entry.providerId,
        createdAt: entry.createdAt,
      });
      return undefined;
    }

    return entry.payload;
  }

  /**
   * Stores `result` under `key`, replacing any previous entry.
   * @throws {McpError} InternalError when the entry cannot be written.
   */
  async put(
    key: string,
    result: AnnotationResult,
    context?: RequestContext,
    meta: CacheEntryMeta = {},
  ): Promise<void> {
    const entry = {
      key,
      providerId: result.providerId,
      ...(meta.pdbId ? { pdbId: normalizePdbId(meta.pdbId) } : {}),
      createdAt: new Date(this.now()).toISOString(),
      ttlSeconds: this.ttlSeconds,
      payload: result,
    };
    const target = this.entryPath(key);
    const temp = `${target}.${process.pid}.${randomUUID()}${TEMP_SUFFIX}`;

    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(temp, JSON.stringify(entry), 'utf-8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw new McpError(
        JsonRpcErrorCode.InternalError,
        `Failed to write cache entry: ${errorMessage(error)}`,
        { ...context, key, cacheDir: this.cacheDir },
        { cause: error },
      );
    }

    logger.debug('Cache entry written', {
      ...context,
      key,
      providerId: result.providerId,
    });
  }

  /**
   * Removes every entry (and any leftover temporary file).
   * @returns Number of entries removed.
   */
  async clear(context?: RequestContext): Promise<number> {
    const names = await this.listDirectory();
    let removed = 0;

    for (const name of names) {
      const isEntry = name.endsWith(ENTRY_SUFFIX);
      if (!isEntry && !name.endsWith(TEMP_SUFFIX)) continue;
      await rm(path.join(this.cacheDir, name), { force: true });
      if (isEntry) removed += 1;
    }

    logger.info('Cache cleared', { ...context, removed, cacheDir: this.cacheDir });
    return removed;
  }

  /**
   * Removes the entries stored for `pdbId`, from every provider or only from
   * `providerId`.
   * @returns Number of entries removed.
   */
  async invalidate(
    pdbId: string,
    providerId?: string,
    context?: RequestContext,
  ): Promise<number> {
    const targetPdbId = normalizePdbId(pdbId);
    const targetProvider = providerId?.trim().toLowerCase();
    let removed = 0;

    for (const name of await this.listDirectory()) {
      if (!name.endsWith(ENTRY_SUFFIX)) continue;
      const filePath = path.join(this.cacheDir, name);
      const entry = await this.readEntry(filePath, context);
      if (!entry || entry.pdbId !== targetPdbId) continue;
      if (targetProvider && entry.providerId !== targetProvider) continue;
      await rm(filePath, { force: true });
      removed += 1;
    }

    logger.info('Cache entries invalidated', {
      ...context,
      pdbId: targetPdbId,
      providerId: targetProvider,
      removed,
    });
    return removed;
  }

  /**
   * Removes expired entries, and entries that can no longer be read as one.
   * @returns Number of entries removed.
   */
  async purgeExpired(context?: RequestContext): Promise<number> {
    let removed = 0;

    for (const name of await this.listDirectory()) {
      if (!name.endsWith(ENTRY_SUFFIX)) continue;
      const filePath = path.join(this.cacheDir, name);
      const entry = await this.readEntry(filePath, context);
      if (entry && !this.isExpired(entry)) continue;
      await rm(filePath, { force: true });
      removed += 1;
    }

    logger.info('Expired cache entries purged', {
      ...context,
      removed,
      cacheDir: this.cacheDir,
    });
    return removed;
  }

  /**
   * Summarizes the entries on disk. Expired entries are counted, not removed.
   */
  async stats(context?: RequestContext): Promise<CacheStats> {
    const stats: CacheStats = {
      cacheDir: this.cacheDir,
      totalEntries: 0,
      expiredEntries: 0,
      totalBytes: 0,
      byProvider: {},
    };

    for (const name of await this.listDirectory()) {
      if (!name.endsWith(ENTRY_SUFFIX)) continue;
      const filePath = path.join(this.cacheDir, name);
      const entry = await this.readEntry(filePath, context);
      if (!entry) continue;

      stats.totalEntries += 1;
      stats.byProvider[entry.providerId] =
        (stats.byProvider[entry.providerId] ?? 0) + 1;
      if (this.isExpired(entry)) stats.expiredEntries += 1;
      try {
        stats.totalBytes += (await stat(filePath)).size;
      } catch (error) {
        if (!isMissingFileError(error)) throw error;
      }
    }

    return stats;
  }

  private entryPath(key: string): string {
    if (!/^[0-9a-f]+$/i.test(key)) {
      throw new McpError(
        JsonRpcErrorCode.InvalidParams,
        `Cache keys must be hex digests (got "${key}").`,
      );
    }
    return path.join(this.cacheDir, `${key}${ENTRY_SUFFIX}`);
  }

  private isExpired(entry: CacheEntry): boolean {
    const createdAt = Date.parse(entry.createdAt);
    if (Number.isNaN(createdAt)) return true;
    return this.now() - createdAt > entry.ttlSeconds * 1000;
  }

  private async readEntry(
    filePath: string,
    context?: RequestContext,
  ): Promise<CacheEntry | undefined> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFileError(error)) {
        logger.debug('Cache entry unreadable, treating as miss', {
          ...context,
          filePath,
          error,
        });
      }
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.debug('Cache entry is not valid JSON, treating as miss', {
        ...context,
        filePath,
        error,
      });
      return undefined;
    }

    const parsed = CacheEntrySchema.safeParse(json);
    if (!parsed.success) {
      logger.debug('Cache entry failed validation, treating as miss', {
        ...context,
        filePath,
        issues: parsed.error.issues.length,
      });
      return undefined;
    }
    return parsed.data;
  }

  private async listDirectory(): Promise<string[]> {
    try {
      return await readdir(this.cacheDir);
    } catch (error) {
      if (isMissingFileError(error)) return [];
      throw error;
    }
  }
}
