/**
 * @fileoverview Local provider backed by bundled RNA 3D Motif Atlas release
 * files (`<dataDir>/atlas/<type>_<version>.json`).
 * @module src/services/motif/providers/atlas.provider
 */
import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';

import { inject, injectable } from 'tsyringe';

import type { AppConfig } from '@/config/index.js';
import { AppConfig as AppConfigToken } from '@/container/tokens.js';
import { errorMessage } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';
import type { IMotifProvider } from '../core/IMotifProvider.js';
import {
  createResult,
  MotifMapBuilder,
  normalizePdbId,
} from '../core/motifMap.js';
import {
  ProviderId,
  ProviderKind,
  type AnnotationResult,
  type MotifInstance,
  type ProviderInfo,
} from '../types.js';
import {
  AtlasReleaseSchema,
  convertRelease,
  parseReleaseFileName,
  selectReleaseFiles,
  type AtlasReleaseFile,
} from './atlas/release.js';

type AtlasIndex = Map<string, MotifInstance[]>;

/**
 * RNA 3D Motif Atlas provider. Files are discovered and indexed by PDB id on
 * the first lookup; later lookups are map reads.
 */
@injectable()
export class AtlasMotifProvider implements IMotifProvider {
  public readonly id = ProviderId.ATLAS;
  private readonly atlasDir: string;
  private readonly versionOverride: string | undefined;
  private index: Promise<AtlasIndex> | undefined;
  private loadedFiles: AtlasReleaseFile[] = [];

  constructor(@inject(AppConfigToken) appConfig: AppConfig) {
    this.atlasDir = path.join(appConfig.dataDir, 'atlas');
    this.versionOverride = appConfig.atlasVersion;
  }

  async getMotifs(
    pdbId: string,
    context: RequestContext,
  ): Promise<AnnotationResult> {
    const normalizedId = normalizePdbId(pdbId);
    const index = await this.loadIndex(context);
    const builder = new MotifMapBuilder();
    for (const instance of index.get(normalizedId) ?? []) {
      builder.add(instance);
    }

    logger.debug('Atlas lookup complete', {
      ...context,
      pdbId: normalizedId,
      instances: builder.size,
    });
    return createResult(this.id, builder.build());
  }

  describe(): ProviderInfo {
    const versions = [
      ...new Set(this.loadedFiles.map((file) => file.version)),
    ].join(', ');
    return {
      id: this.id,
      name: 'RNA 3D Motif Atlas',
      kind: ProviderKind.LOCAL,
      description: versions
        ? `Bundled RNA 3D Motif Atlas release ${versions}`
        : 'Bundled RNA 3D Motif Atlas releases',
      coverage: 'Hairpin, internal and multi-helix junction loops from the representative set',
      cacheable: false,
      motifTypes: this.loadedFiles.map((file) => file.motifType),
    };
  }

  private loadIndex(context: RequestContext): Promise<AtlasIndex> {
    if (!this.index) {
      this.index = this.buildIndex(context).catch((error: unknown) => {
        this.index = undefined;
        throw error;
      });
    }
    return this.index;
  }

  private async buildIndex(context: RequestContext): Promise<AtlasIndex> {
    const byPdb = new Map<string, MotifInstance[]>();
    const loaded: AtlasReleaseFile[] = [];

    let names: string[];
    try {
      names = await readdir(this.atlasDir);
    } catch (error) {
      logger.warning('Atlas directory unavailable; provider will be empty', {
        ...context,
        atlasDir: this.atlasDir,
        error,
      });
      return byPdb;
    }

    const candidates = names
      .map((name) => parseReleaseFileName(name))
      .filter((file): file is AtlasReleaseFile => file !== undefined);

    for (const file of selectReleaseFiles(candidates, this.versionOverride)) {
      const instances = await this.readRelease(file, context);
      if (!instances) continue;
      loaded.push(file);
      for (const instance of instances) {
        const bucket = byPdb.get(instance.pdbId);
        if (bucket) {
          bucket.push(instance);
        } else {
          byPdb.set(instance.pdbId, [instance]);
        }
      }
    }

    this.loadedFiles = loaded;
    logger.info('Atlas releases indexed', {
      ...context,
      files: loaded.map((file) => file.fileName),
      structures: byPdb.size,
    });
    return byPdb;
  }

  private async readRelease(
    file: AtlasReleaseFile,
    context: RequestContext,
  ): Promise<MotifInstance[] | undefined> {
    const filePath = path.join(this.atlasDir, file.fileName);
    let json: unknown;
    try {
      json = JSON.parse(await readFile(filePath, 'utf-8'));
    } catch (error) {
      logger.warning(`Skipping Atlas file ${file.fileName}: ${errorMessage(error)}`, {
        ...context,
        filePath,
      });
      return undefined;
    }

    const parsed = AtlasReleaseSchema.safeParse(json);
    if (!parsed.success) {
      logger.warning(`Skipping Atlas file ${file.fileName}: unexpected structure`, {
        ...context,
        filePath,
        issues: parsed.error.issues.slice(0, 5).map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
      return undefined;
    }
    return convertRelease(parsed.data, file.motifType, this.id);
  }
}
