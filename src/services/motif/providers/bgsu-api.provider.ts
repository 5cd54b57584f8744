/**
 * @fileoverview Remote provider for the BGSU RNA 3D Hub loop download.
 * @module src/services/motif/providers/bgsu-api.provider
 */
import { inject, injectable } from 'tsyringe';

import type { AppConfig } from '@/config/index.js';
import { AppConfig as AppConfigToken } from '@/container/tokens.js';
import {
  fetchWithTimeout,
  httpStatusOf,
  logger,
  type RequestContext,
} from '@/utils/index.js';
import type { IMotifProvider } from '../core/IMotifProvider.js';
import { createResult, normalizePdbId, summarizeMotifs } from '../core/motifMap.js';
import {
  ProviderId,
  ProviderKind,
  type AnnotationResult,
  type ProviderInfo,
} from '../types.js';
import { ACCEPT_HEADER, LOOP_TYPE_NAMES } from './bgsu/config.js';
import { parseLoopCsv } from './bgsu/loops.js';

/**
 * BGSU RNA 3D Hub provider. One GET per lookup; a 404 means the hub has no
 * loops for the structure.
 */
@injectable()
export class BgsuApiMotifProvider implements IMotifProvider {
  public readonly id = ProviderId.BGSU_API;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(@inject(AppConfigToken) appConfig: AppConfig) {
    this.baseUrl = appConfig.bgsuApiUrl;
    this.timeoutMs = appConfig.requestTimeoutMs;
  }

  async getMotifs(
    pdbId: string,
    context: RequestContext,
  ): Promise<AnnotationResult> {
    const normalizedId = normalizePdbId(pdbId);
    const url = `${this.baseUrl}/${encodeURIComponent(normalizedId)}`;

    logger.debug('Fetching loops from BGSU RNA 3D Hub', {
      ...context,
      pdbId: normalizedId,
      url,
    });

    let body: string;
    try {
      const response = await fetchWithTimeout(
        url,
        {
          method: 'GET',
          headers: { Accept: ACCEPT_HEADER },
          timeout: this.timeoutMs,
        },
        context,
      );
      body = await response.text();
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        logger.debug('BGSU RNA 3D Hub has no loops for structure', {
          ...context,
          pdbId: normalizedId,
        });
        return createResult(this.id, {});
      }
      throw error;
    }

    const motifs = parseLoopCsv(body, this.id, context);
    logger.info('BGSU RNA 3D Hub loops fetched', {
      ...context,
      pdbId: normalizedId,
      motifs: summarizeMotifs(motifs),
    });
    return createResult(this.id, motifs);
  }

  describe(): ProviderInfo {
    return {
      id: this.id,
      name: 'BGSU RNA 3D Hub',
      kind: ProviderKind.REMOTE,
      description: `Loop annotations downloaded from ${this.baseUrl}`,
      coverage: 'Every loop the hub annotates in the requested structure',
      cacheable: true,
      motifTypes: Object.keys(LOOP_TYPE_NAMES),
    };
  }

  cacheParameters(): Readonly<Record<string, string>> {
    return { endpoint: this.baseUrl };
  }
}
