/**
 * @fileoverview Tool definition for re-fetching a structure's motifs while
 * bypassing cached remote responses.
 * @module src/mcp-server/tools/definitions/motif-force-refresh.tool
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
import { PdbIdSchema } from './motif-resolve.tool.js';

const TOOL_NAME = 'motif_force_refresh';
const TOOL_TITLE = 'Refresh RNA Motifs';
const TOOL_DESCRIPTION =
  'Resolve motifs again, skipping cached remote responses and overwriting them with fresh data. Without a pdbId, refreshes the most recently resolved structure.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    pdbId: PdbIdSchema.optional(),
  })
  .describe('Parameters for a forced refresh.');

type ForceRefreshInput = z.infer<typeof InputSchema>;

async function motifForceRefreshLogic(
  input: ForceRefreshInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<ResolutionOutput> {
  logger.debug('Forcing motif refresh', { ...appContext, toolInput: input });

  const selector = container.resolve<SourceSelector>(MotifSourceSelector);
  const result = await selector.forceRefresh(input.pdbId, appContext);
  return toResolutionOutput(
    input.pdbId ?? selector.getLastResolvedId() ?? '',
    result,
    selector,
  );
}

export const motifForceRefreshTool: ToolDefinition<
  typeof InputSchema,
  typeof ResolutionOutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: ResolutionOutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: motifForceRefreshLogic,
  responseFormatter: formatResolution,
};
