/**
 * @fileoverview Tool definition for switching to user annotation files of
 * one external analysis tool.
 * @module src/mcp-server/tools/definitions/motif-select-user-tool.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { MotifSourceSelector } from '@/container/tokens.js';
import { SourceConfigSchema } from '@/mcp-server/tools/utils/resolutionOutput.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { SourceSelector } from '@/services/motif/core/SourceSelector.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'motif_select_user_tool';
const TOOL_TITLE = 'Select Annotation Tool';
const TOOL_DESCRIPTION =
  'Switch to user mode, reading motif annotations from output files of the named tool ("fr3d" or "rnamotifscan"). An unknown tool name fails immediately and leaves the current source unchanged.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  idempotentHint: true,
  openWorldHint: false,
};

const InputSchema = z
  .object({
    tool: z
      .string()
      .trim()
      .min(1)
      .describe('Annotation tool name: "fr3d" or "rnamotifscan".'),
  })
  .describe('Parameters for selecting a user annotation tool.');

const OutputSchema = z
  .object({
    config: SourceConfigSchema,
    availableStructures: z
      .array(z.string())
      .describe('Structure ids that have a file for the selected tool.'),
  })
  .describe('Source configuration after selecting the tool.');

type SelectUserToolInput = z.infer<typeof InputSchema>;
type SelectUserToolOutput = z.infer<typeof OutputSchema>;

async function motifSelectUserToolLogic(
  input: SelectUserToolInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<SelectUserToolOutput> {
  logger.debug('Selecting user annotation tool', {
    ...appContext,
    toolInput: input,
  });

  const selector = container.resolve<SourceSelector>(MotifSourceSelector);
  const config = selector.selectUserTool(input.tool);
  const availableStructures = await selector.listAvailableUserFiles();
  return { config: { ...config }, availableStructures };
}

function responseFormatter(result: SelectUserToolOutput): ContentBlock[] {
  const structures = result.availableStructures.length
    ? result.availableStructures.join(', ')
    : 'none';
  return [
    {
      type: 'text',
      text: `Using ${result.config.activeUserTool ?? 'unknown'} annotation files.\nStructures with files: ${structures}`,
    },
  ];
}

export const motifSelectUserToolTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: motifSelectUserToolLogic,
  responseFormatter,
};
