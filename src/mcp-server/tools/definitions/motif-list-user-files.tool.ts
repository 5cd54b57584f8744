/**
 * @fileoverview Tool definition for listing structures that have user
 * annotation files.
 * @module src/mcp-server/tools/definitions/motif-list-user-files.tool
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

const TOOL_NAME = 'motif_list_user_files';
const TOOL_TITLE = 'List User Annotation Files';
const TOOL_DESCRIPTION =
  'List the structure ids that have annotation files for a tool. Without a tool, uses the selected user tool, or every supported tool when none is selected.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: false,
};

const InputSchema = z
  .object({
    tool: z
      .string()
      .trim()
      .min(1)
      .optional()
      .describe('Annotation tool name: "fr3d" or "rnamotifscan".'),
  })
  .describe('Parameters for listing user annotation files.');

const OutputSchema = z
  .object({
    tool: z.string().optional().describe('Tool the listing was made for.'),
    pdbIds: z.array(z.string()).describe('Sorted, unique structure ids.'),
    count: z.number().int().describe('Number of structure ids.'),
  })
  .describe('Structures with user annotation files.');

type ListUserFilesInput = z.infer<typeof InputSchema>;
type ListUserFilesOutput = z.infer<typeof OutputSchema>;

async function motifListUserFilesLogic(
  input: ListUserFilesInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<ListUserFilesOutput> {
  logger.debug('Listing user annotation files', {
    ...appContext,
    toolInput: input,
  });

  const selector = container.resolve<SourceSelector>(MotifSourceSelector);
  const pdbIds = await selector.listAvailableUserFiles(input.tool);
  const tool = input.tool ?? selector.getConfig().activeUserTool;
  return {
    ...(tool ? { tool: tool.toLowerCase() } : {}),
    pdbIds,
    count: pdbIds.length,
  };
}

function responseFormatter(result: ListUserFilesOutput): ContentBlock[] {
  const scope = result.tool ?? 'all tools';
  return [
    {
      type: 'text',
      text:
        result.count === 0
          ? `No annotation files found for ${scope}.`
          : `${result.count} structure(s) with ${scope} annotation files: ${result.pdbIds.join(', ')}`,
    },
  ];
}

export const motifListUserFilesTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: motifListUserFilesLogic,
  responseFormatter,
};
