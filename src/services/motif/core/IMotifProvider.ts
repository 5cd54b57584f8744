/**
 * @fileoverview Provider interface for motif data sources.
 * Local datasets, remote APIs and user annotation files all implement this
 * contract; the source selector depends on nothing else.
 * @module src/services/motif/core/IMotifProvider
 */

import type { RequestContext } from '@/utils/index.js';
import type { AnnotationResult, ProviderInfo } from '../types.js';

/**
 * Standard interface for motif providers.
 */
export interface IMotifProvider {
  /**
   * Stable provider id, used for attribution and cache keys
   */
  readonly id: string;

  /**
   * Retrieve every motif instance the source holds for a structure
   * @param pdbId - Structure identifier; providers uppercase it themselves
   * @param context - Request context for tracing and logging
   * @returns Motifs grouped by type; an empty mapping when the source has no
   *   data for this structure
   * @throws {McpError} NotFound, ServiceUnavailable, Timeout or MalformedData
   */
  getMotifs(pdbId: string, context: RequestContext): Promise<AnnotationResult>;

  /**
   * Name, coverage and caching metadata for status display
   */
  describe(): ProviderInfo;

  /**
   * Query parameters that change this provider's response, folded into the
   * cache key alongside the provider id and PDB id
   */
  cacheParameters?(): Readonly<Record<string, string | number | boolean>>;
}
