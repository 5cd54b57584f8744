/**
 * @fileoverview Tool definition for inspecting and clearing the remote
 * response cache: everything, only expired entries, or one structure.
 * @module src/mcp-server/tools/definitions/motif-clear-cache.tool
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
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { type RequestContext, logger } from '@/utils/index.js';
import { PdbIdSchema } from './motif-resolve.tool.js';

const TOOL_NAME = 'motif_clear_cache';
const TOOL_TITLE = 'Clear Motif Cache';
const TOOL_DESCRIPTION =
  'Delete cached remote motif responses. By default removes every entry; with expiredOnly, only entries past their 30-day lifetime; with pdbId, only that structure (optionally only one provider). With dryRun, only report what the cache holds.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: true,
  idempotentHint: true,
  openWorldHint: false,
};

const InputSchema = z
  .object({
    dryRun: z
      .boolean()
      .default(false)
      .describe('Report cache statistics without deleting anything.'),
    expiredOnly: z
      .boolean()
      .default(false)
      .describe('Remove only expired or unreadable entries.'),
    pdbId: PdbIdSchema.optional().describe(
      'Remove only the entries for this structure.',
    ),
    providerId: z
      .string()
      .trim()
      .min(1)
      .optional()
      .describe('With pdbId, remove only this provider\'s entry (e.g. "bgsu_api").'),
  })
  .describe('Parameters for clearing the cache.');

const CacheStatsSchema = z.object({
  cacheDir: z.string().describe('Cache directory.'),
  totalEntries: z.number().int().describe('Entries on disk.'),
  expiredEntries: z.number().int().describe('Entries past their TTL.'),
  totalBytes: z.number().int().describe('Size of all entries.'),
  byProvider: z.record(z.number().int()).describe('Entries per provider.'),
});

const ClearScopeSchema = z.enum(['all', 'expired', 'structure']);

const OutputSchema = z
  .object({
    scope: ClearScopeSchema.describe('Which entries were targeted.'),
    removed: z.number().int().describe('Entries deleted.'),
    before: CacheStatsSchema.describe('Cache state before the operation.'),
  })
  .describe('Cache clearing result.');

type ClearCacheInput = z.infer<typeof InputSchema>;
type ClearCacheOutput = z.infer<typeof OutputSchema>;
type ClearScope = z.infer<typeof ClearScopeSchema>;

function scopeOf(input: ClearCacheInput): ClearScope {
  if (input.providerId && !input.pdbId) {
    throw new McpError(
      JsonRpcErrorCode.InvalidParams,
      'providerId can only narrow a pdbId invalidation.',
      { providerId: input.providerId },
    );
  }
  if (input.expiredOnly && input.pdbId) {
    throw new McpError(
      JsonRpcErrorCode.InvalidParams,
      'Choose either expiredOnly or pdbId, not both.',
      { pdbId: input.pdbId },
    );
  }
  if (input.expiredOnly) return 'expired';
  return input.pdbId ? 'structure' : 'all';
}

async function motifClearCacheLogic(
  input: ClearCacheInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<ClearCacheOutput> {
  logger.debug('Clearing motif cache', { ...appContext, toolInput: input });

  const scope = scopeOf(input);
  const selector = container.resolve<SourceSelector>(MotifSourceSelector);
  const before = await selector.cacheStats(appContext);
  if (input.dryRun) return { scope, removed: 0, before };

  const removed = input.expiredOnly
    ? await selector.purgeExpiredCache(appContext)
    : input.pdbId
      ? await selector.invalidateCache(input.pdbId, input.providerId, appContext)
      : await selector.clearCache(appContext);
  return { scope, removed, before };
}

function responseFormatter(result: ClearCacheOutput): ContentBlock[] {
  const { before } = result;
  const providers = Object.entries(before.byProvider)
    .map(([provider, count]) => `${provider}: ${count}`)
    .join(', ');
  return [
    {
      type: 'text',
      text: [
        `Removed ${result.removed} cache entr${result.removed === 1 ? 'y' : 'ies'} (${result.scope}) from ${before.cacheDir}.`,
        `Before: ${before.totalEntries} entries (${before.expiredEntries} expired, ${(before.totalBytes / 1024).toFixed(1)} KB)${providers ? `; ${providers}` : ''}`,
      ].join('\n'),
    },
  ];
}

export const motifClearCacheTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: motifClearCacheLogic,
  responseFormatter,
};
