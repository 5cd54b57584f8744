/**
 * @fileoverview Tool definition for resolving motif annotations of a
 * structure under the active source configuration.
 * @module src/mcp-server/tools/definitions/motif-resolve.tool
 */
import { container } from 'tsyringe';
import { z } from 'zod';

import { MotifSourceSelector } from '@/container/tokens.js';
import {
  formatResolution,
  ResolutionOutputSchema,
  toResolutionOutput,
  type ResolutionOutput,
} from '@/mcp-server/tools/utils/resolutionOutput.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { SourceSelector } from '@/services/motif/core/SourceSelector.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'motif_resolve';
const TOOL_TITLE = 'Resolve RNA Motifs';
const TOOL_DESCRIPTION =
  'Return the structural motif instances (hairpin, internal and junction loops, Rfam families, user annotations) of an RNA structure, grouped by motif type. Sources are chosen by the active source mode; set it with motif_set_source.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

export const PdbIdSchema = z
  .string()
  .trim()
  .regex(/^[0-9A-Za-z]{4}$/, 'PDB ID must be 4 alphanumeric characters.')
  .describe('4-character PDB identifier (e.g., "1S72", "4V9F").');

const InputSchema = z
  .object({
    pdbId: PdbIdSchema,
  })
  .describe('Parameters for resolving the motifs of a structure.');

type ResolveInput = z.infer<typeof InputSchema>;

async function motifResolveLogic(
  input: ResolveInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<ResolutionOutput> {
  logger.debug('Resolving motifs', { ...appContext, toolInput: input });

  const selector = container.resolve<SourceSelector>(MotifSourceSelector);
  const result = await selector.resolve(input.pdbId, appContext);
  return toResolutionOutput(input.pdbId, result, selector);
}

export const motifResolveTool: ToolDefinition<
  typeof InputSchema,
  typeof ResolutionOutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: ResolutionOutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: motifResolveLogic,
  responseFormatter: formatResolution,
};
