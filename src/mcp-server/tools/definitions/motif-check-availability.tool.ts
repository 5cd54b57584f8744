/**
 * @fileoverview Tool definition for checking which sources hold motif data
 * for a structure, without changing the source mode.
 * @module src/mcp-server/tools/definitions/motif-check-availability.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { MotifSourceSelector } from '@/container/tokens.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { SourceSelector } from '@/services/motif/core/SourceSelector.js';
import { type RequestContext, logger } from '@/utils/index.js';
import { PdbIdSchema } from './motif-resolve.tool.js';

const TOOL_NAME = 'motif_check_availability';
const TOOL_TITLE = 'Check Motif Source Availability';
const TOOL_DESCRIPTION =
  'Report which motif sources hold data for a structure. Bundled sources and user annotation files are checked directly; web sources are judged from the cache only and read "unknown" until resolved once.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: false,
};

const InputSchema = z
  .object({
    pdbId: PdbIdSchema,
  })
  .describe('Parameters for checking source availability.');

const OutputSchema = z
  .object({
    pdbId: z.string().describe('Normalized structure id.'),
    sources: z
      .record(z.enum(['available', 'absent', 'unknown']))
      .describe('Availability per source id; user tools appear as "user:<tool>".'),
  })
  .describe('Source availability for one structure.');

type CheckAvailabilityInput = z.infer<typeof InputSchema>;
type CheckAvailabilityOutput = z.infer<typeof OutputSchema>;

async function motifCheckAvailabilityLogic(
  input: CheckAvailabilityInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<CheckAvailabilityOutput> {
  logger.debug('Checking motif source availability', {
    ...appContext,
    toolInput: input,
  });

  const selector = container.resolve<SourceSelector>(MotifSourceSelector);
  const sources = await selector.checkAvailability(input.pdbId, appContext);
  return { pdbId: input.pdbId.toUpperCase(), sources };
}

function responseFormatter(result: CheckAvailabilityOutput): ContentBlock[] {
  const lines = Object.entries(result.sources).map(
    ([source, status]) => `• ${source}: ${status}`,
  );
  return [
    {
      type: 'text',
      text: `${result.pdbId} source availability:\n${lines.join('\n')}`,
    },
  ];
}

export const motifCheckAvailabilityTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: motifCheckAvailabilityLogic,
  responseFormatter,
};
