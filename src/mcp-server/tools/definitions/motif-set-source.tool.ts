/**
 * @fileoverview Tool definition for changing the motif source mode.
 * @module src/mcp-server/tools/definitions/motif-set-source.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { MotifSourceSelector } from '@/container/tokens.js';
import {
  ProviderSummarySchema,
  SourceConfigSchema,
  summarizeProviders,
} from '@/mcp-server/tools/utils/resolutionOutput.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { SourceSelector } from '@/services/motif/core/SourceSelector.js';
import { SourceMode } from '@/services/motif/types.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'motif_set_source';
const TOOL_TITLE = 'Set Motif Source';
const TOOL_DESCRIPTION =
  'Choose where motif annotations come from. Modes: auto (bundled data first, then web APIs, first non-empty wins), local (bundled data; source "atlas" or "rfam"), web (remote APIs; source "bgsu" or "rfam"), all (every bundled and web source merged), user (annotation files; source is the tool, "fr3d" or "rnamotifscan").';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  idempotentHint: true,
  openWorldHint: false,
};

const InputSchema = z
  .object({
    mode: z
      .string()
      .describe(`Source mode to activate: ${Object.values(SourceMode).join(', ')}.`),
    source: z
      .string()
      .trim()
      .min(1)
      .optional()
      .describe(
        'Optional narrowing: one source for local/web, or the annotation tool for user mode.',
      ),
  })
  .describe('Parameters for changing the source mode.');

const OutputSchema = z
  .object({
    config: SourceConfigSchema,
    activeSources: z
      .array(ProviderSummarySchema)
      .describe('Providers the new configuration queries, in order.'),
  })
  .describe('Source configuration after the change.');

type SetSourceInput = z.infer<typeof InputSchema>;
type SetSourceOutput = z.infer<typeof OutputSchema>;

async function motifSetSourceLogic(
  input: SetSourceInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<SetSourceOutput> {
  logger.debug('Setting motif source', { ...appContext, toolInput: input });

  const selector = container.resolve<SourceSelector>(MotifSourceSelector);
  const config = selector.setMode(input.mode, input.source);
  return {
    config: { ...config },
    activeSources: summarizeProviders(selector.describeActiveSources()),
  };
}

function responseFormatter(result: SetSourceOutput): ContentBlock[] {
  const { mode, narrowing, activeUserTool } = result.config;
  const detail = narrowing ?? activeUserTool;
  const sources = result.activeSources
    .map((source) => `• ${source.name} (${source.id}, ${source.kind})`)
    .join('\n');
  return [
    {
      type: 'text',
      text: `Source mode: ${mode}${detail ? ` (${detail})` : ''}\n\nActive sources:\n${sources}`,
    },
  ];
}

export const motifSetSourceTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: motifSetSourceLogic,
  responseFormatter,
};
