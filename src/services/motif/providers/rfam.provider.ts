/**
 * @fileoverview Local provider backed by bundled Rfam motif seed alignments
 * (`<dataDir>/rfam/<Motif>/SEED`, Stockholm format).
 * @module src/services/motif/providers/rfam.provider
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
  createMotifInstance,
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
  motifTypeFromDirectory,
  parseSeedSequenceName,
  parseStockholm,
  ungap,
} from './rfam/stockholm.js';

const SEED_FILE = 'SEED';

/**
 * Rfam motif provider. Every SEED alignment is read once on the first lookup
 * and indexed by the PDB ids named in its sequence names.
 */
@injectable()
export class RfamMotifProvider implements IMotifProvider {
  public readonly id = ProviderId.RFAM;
  private readonly rfamDir: string;
  private index: Promise<Map<string, MotifInstance[]>> | undefined;
  private motifTypes: string[] = [];

  constructor(@inject(AppConfigToken) appConfig: AppConfig) {
    this.rfamDir = path.join(appConfig.dataDir, 'rfam');
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

    logger.debug('Rfam seed lookup complete', {
      ...context,
      pdbId: normalizedId,
      instances: builder.size,
    });
    return createResult(this.id, builder.build());
  }

  describe(): ProviderInfo {
    return {
      id: this.id,
      name: 'Rfam motifs',
      kind: ProviderKind.LOCAL,
      description: 'Bundled Rfam motif seed alignments',
      coverage: 'Structure-backed seed members of Rfam motif families',
      cacheable: false,
      motifTypes: [...this.motifTypes],
    };
  }

  private loadIndex(
    context: RequestContext,
  ): Promise<Map<string, MotifInstance[]>> {
    if (!this.index) {
      this.index = this.buildIndex(context).catch((error: unknown) => {
        this.index = undefined;
        throw error;
      });
    }
    return this.index;
  }

  private async buildIndex(
    context: RequestContext,
  ): Promise<Map<string, MotifInstance[]>> {
    const index = new Map<string, MotifInstance[]>();

    let directories: string[];
    try {
      directories = (await readdir(this.rfamDir, { withFileTypes: true }))
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      logger.warning('Rfam directory unavailable; provider will be empty', {
        ...context,
        rfamDir: this.rfamDir,
        error,
      });
      return index;
    }

    const types: string[] = [];
    for (const directory of directories) {
      const seedPath = path.join(this.rfamDir, directory, SEED_FILE);
      let text: string;
      try {
        text = await readFile(seedPath, 'utf-8');
      } catch (error) {
        logger.debug(`No readable SEED in ${directory}: ${errorMessage(error)}`, {
          ...context,
          seedPath,
        });
        continue;
      }

      const motifType = motifTypeFromDirectory(directory);
      const instances = this.convertSeed(text, motifType);
      types.push(motifType);
      for (const instance of instances) {
        const bucket = index.get(instance.pdbId);
        if (bucket) {
          bucket.push(instance);
        } else {
          index.set(instance.pdbId, [instance]);
        }
      }
    }

    this.motifTypes = types;
    logger.info('Rfam seed alignments indexed', {
      ...context,
      motifTypes: types,
      structures: index.size,
    });
    return index;
  }

  private convertSeed(text: string, motifType: string): MotifInstance[] {
    const { features, sequences } = parseStockholm(text);
    const instances: MotifInstance[] = [];
    for (const [name, aligned] of sequences) {
      const seed = parseSeedSequenceName(name);
      if (!seed) continue;
      instances.push(
        createMotifInstance({
          instanceId: name,
          motifType,
          pdbId: seed.pdbId,
          chain: seed.chain,
          modelNumber: 1,
          residueStart: seed.start,
          residueEnd: seed.end,
          sequence: ungap(aligned) || undefined,
          description: features['DE'],
          sourceId: this.id,
        }),
      );
    }
    return instances;
  }
}
