/**
 * @fileoverview Motif tool definitions and the list the server registers.
 * @module src/mcp-server/tools/definitions
 */
import type { AnyToolDefinition } from '@/mcp-server/tools/utils/toolDefinition.js';
import { motifCheckAvailabilityTool } from './motif-check-availability.tool.js';
import { motifClearCacheTool } from './motif-clear-cache.tool.js';
import { motifForceRefreshTool } from './motif-force-refresh.tool.js';
import { motifListUserFilesTool } from './motif-list-user-files.tool.js';
import { motifResolveTool } from './motif-resolve.tool.js';
import { motifSelectUserToolTool } from './motif-select-user-tool.tool.js';
import { motifSetSourceTool } from './motif-set-source.tool.js';

export {
  motifCheckAvailabilityTool,
  motifClearCacheTool,
  motifForceRefreshTool,
  motifListUserFilesTool,
  motifResolveTool,
  motifSelectUserToolTool,
  motifSetSourceTool,
};

export const allToolDefinitions: readonly AnyToolDefinition[] = [
  // Resolution
  motifResolveTool,
  motifForceRefreshTool,
  // Source configuration
  motifSetSourceTool,
  motifSelectUserToolTool,
  motifListUserFilesTool,
  motifCheckAvailabilityTool,
  // Cache
  motifClearCacheTool,
];
