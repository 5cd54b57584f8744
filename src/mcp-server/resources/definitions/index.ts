/**
 * @fileoverview Resource definitions served by the motif server.
 * @module src/mcp-server/resources/definitions
 */
import type { AnyResourceDefinition } from '@/mcp-server/resources/utils/resourceDefinition.js';
import { motifAnnotationsResource } from './motif-annotations.resource.js';

export { motifAnnotationsResource };

/** Registered in order by `createMcpServer`. */
export const allResourceDefinitions: readonly AnyResourceDefinition[] = [
  motifAnnotationsResource,
];
