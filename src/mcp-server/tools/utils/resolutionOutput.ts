/**
 * @fileoverview Output schema and text rendering shared by the tools that
 * return a motif resolution.
 * @module src/mcp-server/tools/utils/resolutionOutput
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { SourceSelector } from '@/services/motif/core/SourceSelector.js';
import {
  countInstances,
  normalizePdbId,
} from '@/services/motif/core/motifMap.js';
import { MotifMapSchema } from '@/services/motif/schemas.js';
import {
  LocalSource,
  ProviderKind,
  SourceMode,
  UserTool,
  WebSource,
  type AnnotationResult,
  type ProviderInfo,
} from '@/services/motif/types.js';

export const SourceConfigSchema = z
  .object({
    mode: z.nativeEnum(SourceMode).describe('Active source mode.'),
    narrowing: z
      .union([z.nativeEnum(LocalSource), z.nativeEnum(WebSource)])
      .optional()
      .describe('Single source the mode is narrowed to, if any.'),
    activeUserTool: z
      .nativeEnum(UserTool)
      .optional()
      .describe('Annotation tool read in user mode.'),
  })
  .describe('Source selection configuration.');

export const ProviderSummarySchema = z.object({
  id: z.string().describe('Provider id.'),
  name: z.string().describe('Display name.'),
  kind: z.nativeEnum(ProviderKind).describe('local, remote or user.'),
  cacheable: z.boolean().describe('Whether responses are cached on disk.'),
});

export const ProviderOutcomeSchema = z.enum([
  'hit',
  'cache_hit',
  'empty',
  'not_found',
  'unavailable',
  'malformed',
]);

export const ResolutionOutputSchema = z
  .object({
    pdbId: z.string().describe('Uppercase structure identifier.'),
    providerId: z
      .string()
      .describe(
        'Provider that produced the result; "all" for a union and "none" when no source had data.',
      ),
    fetchedAt: z.string().describe('ISO-8601 time the data was produced.'),
    mode: z.nativeEnum(SourceMode).describe('Source mode used.'),
    instanceCount: z.number().int().describe('Instances across all types.'),
    motifs: MotifMapSchema.describe('Instances grouped by motif type.'),
    outcomes: z
      .record(ProviderOutcomeSchema)
      .describe('Per-provider outcome of this resolution.'),
  })
  .describe('Motif annotations for one structure.');

export type ResolutionOutput = z.infer<typeof ResolutionOutputSchema>;

export function summarizeProviders(
  providers: readonly ProviderInfo[],
): z.infer<typeof ProviderSummarySchema>[] {
  return providers.map(({ id, name, kind, cacheable }) => ({
    id,
    name,
    kind,
    cacheable,
  }));
}

export function toResolutionOutput(
  pdbId: string,
  result: AnnotationResult,
  selector: SourceSelector,
): ResolutionOutput {
  return {
    pdbId: normalizePdbId(pdbId),
    providerId: result.providerId,
    fetchedAt: result.fetchedAt,
    mode: selector.getConfig().mode,
    instanceCount: countInstances(result.motifs),
    motifs: Object.fromEntries(
      Object.entries(result.motifs).map(([type, instances]) => [
        type,
        [...instances],
      ]),
    ),
    outcomes: { ...selector.getLastOutcomes() },
  };
}

export function formatResolution(result: ResolutionOutput): ContentBlock[] {
  if (result.instanceCount === 0) {
    return [
      {
        type: 'text',
        text: `No motifs found for ${result.pdbId} (mode: ${result.mode}).`,
      },
    ];
  }

  const lines = Object.entries(result.motifs).map(([type, instances]) => {
    const sample = instances
      .slice(0, 3)
      .map(
        (instance) =>
          `${instance.chain}:${instance.residueStart}-${instance.residueEnd}`,
      )
      .join(', ');
    const more = instances.length > 3 ? ', ...' : '';
    return `• ${type}: ${instances.length} (${sample}${more})`;
  });

  return [
    {
      type: 'text',
      text: [
        `${result.pdbId}: ${result.instanceCount} motif instance(s) from ${result.providerId} (mode: ${result.mode})`,
        ...lines,
      ].join('\n'),
    },
  ];
}
