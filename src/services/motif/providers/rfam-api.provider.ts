/**
 * @fileoverview Remote provider for Rfam family mappings served by the PDBe
 * REST API.
 * @module src/services/motif/providers/rfam-api.provider
 */
import { inject, injectable } from 'tsyringe';

import type { AppConfig } from '@/config/index.js';
import { AppConfig as AppConfigToken } from '@/container/tokens.js';
import { JsonRpcErrorCode, McpError, errorMessage } from '@/types-global/errors.js';
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
import {
  convertRfamMappings,
  RfamMappingResponseSchema,
} from './pdbe/rfam-mappings.js';

/**
 * Rfam provider over the PDBe mapping endpoint. One GET per lookup returns
 * every Rfam family mapped onto the structure's chains.
 */
@injectable()
export class RfamApiMotifProvider implements IMotifProvider {
  public readonly id = ProviderId.RFAM_API;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;

  constructor(@inject(AppConfigToken) appConfig: AppConfig) {
    this.apiUrl = appConfig.pdbeApiUrl;
    this.timeoutMs = appConfig.requestTimeoutMs;
  }

  async getMotifs(
    pdbId: string,
    context: RequestContext,
  ): Promise<AnnotationResult> {
    const normalizedId = normalizePdbId(pdbId);
    const url = `${this.apiUrl}/mappings/rfam/${encodeURIComponent(normalizedId.toLowerCase())}`;

    logger.debug('Fetching Rfam mappings from PDBe', {
      ...context,
      pdbId: normalizedId,
      url,
    });

    let json: unknown;
    try {
      const response = await fetchWithTimeout(
        url,
        {
          method: 'GET',
          headers: { Accept: 'application/json' },
          timeout: this.timeoutMs,
        },
        context,
      );
      json = await response.json();
    } catch (error) {
      if (error instanceof McpError) {
        if (httpStatusOf(error) === 404) {
          logger.debug('PDBe has no Rfam mappings for structure', {
            ...context,
            pdbId: normalizedId,
          });
          return createResult(this.id, {});
        }
        throw error;
      }
      throw new McpError(
        JsonRpcErrorCode.MalformedData,
        `PDBe Rfam mapping response is not JSON: ${errorMessage(error)}`,
        { requestId: context.requestId, pdbId: normalizedId },
        { cause: error },
      );
    }

    const parsed = RfamMappingResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new McpError(
        JsonRpcErrorCode.MalformedData,
        'PDBe Rfam mapping response failed validation',
        {
          requestId: context.requestId,
          pdbId: normalizedId,
          issues: parsed.error.issues.slice(0, 5).map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        },
      );
    }

    const motifs = convertRfamMappings(parsed.data, normalizedId, this.id);
    logger.info('Rfam mappings fetched', {
      ...context,
      pdbId: normalizedId,
      motifs: summarizeMotifs(motifs),
    });
    return createResult(this.id, motifs);
  }

  describe(): ProviderInfo {
    return {
      id: this.id,
      name: 'Rfam (PDBe mappings)',
      kind: ProviderKind.REMOTE,
      description: `Rfam family mappings from ${this.apiUrl}`,
      coverage:
        'Whole Rfam families (RF accessions, e.g. rRNA or tRNA families) mapped onto chains of any released structure; not Rfam motifs (RM ids such as GNRA or T-loop), which the bundled rfam source provides',
      cacheable: true,
      motifTypes: [],
    };
  }

  cacheParameters(): Readonly<Record<string, string>> {
    return { endpoint: `${this.apiUrl}/mappings/rfam` };
  }
}
