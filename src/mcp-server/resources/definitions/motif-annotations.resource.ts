/**
 * @fileoverview Resource definition exposing a structure's resolved motifs
 * via `motif://{pdbId}`.
 * @module src/mcp-server/resources/definitions/motif-annotations.resource
 */
import { container } from 'tsyringe';
import { z } from 'zod';

import { MotifSourceSelector } from '@/container/tokens.js';
import type { ResourceDefinition } from '@/mcp-server/resources/utils/resourceDefinition.js';
import { PdbIdSchema } from '@/mcp-server/tools/definitions/motif-resolve.tool.js';
import {
  ResolutionOutputSchema,
  toResolutionOutput,
} from '@/mcp-server/tools/utils/resolutionOutput.js';
import type { SourceSelector } from '@/services/motif/core/SourceSelector.js';
import { logger } from '@/utils/index.js';

const ParamsSchema = z
  .object({
    pdbId: PdbIdSchema,
  })
  .describe('Motif resource parameters.');

const OutputSchema = ResolutionOutputSchema.extend({
  requestUri: z.string().describe('URI the resource was read from.'),
}).describe('Motif annotations resource response.');

export const motifAnnotationsResource: ResourceDefinition<
  typeof ParamsSchema,
  typeof OutputSchema
> = {
  name: 'motif-annotations',
  title: 'RNA Motif Annotations',
  description:
    'Motif instances of an RNA structure, resolved under the active source mode, via motif://{pdbId}.',
  uriTemplate: 'motif://{pdbId}',
  paramsSchema: ParamsSchema,
  outputSchema: OutputSchema,
  mimeType: 'application/json',
  examples: [{ name: 'Motifs of the large ribosomal subunit 1S72', uri: 'motif://1S72' }],
  async logic(uri, params, context) {
    logger.debug('Processing motif resource', {
      ...context,
      resourceUri: uri.href,
      pdbId: params.pdbId,
    });

    const selector = container.resolve<SourceSelector>(MotifSourceSelector);
    const result = await selector.resolve(params.pdbId, context);
    return {
      ...toResolutionOutput(params.pdbId, result, selector),
      requestUri: uri.href,
    };
  },
};
