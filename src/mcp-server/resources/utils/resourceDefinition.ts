/**
 * @fileoverview Shape of a declarative resource definition.
 * @module src/mcp-server/resources/utils/resourceDefinition
 */
import type { z } from 'zod';

import type { RequestContext } from '@/utils/index.js';

export interface ResourceDefinition<
  TParamsSchema extends z.AnyZodObject,
  TOutputSchema extends z.AnyZodObject,
> {
  name: string;
  title: string;
  description: string;
  /** RFC 6570 template, e.g. `motif://{pdbId}`. */
  uriTemplate: string;
  paramsSchema: TParamsSchema;
  outputSchema: TOutputSchema;
  mimeType: string;
  examples?: Array<{ name: string; uri: string }>;

  logic(
    uri: URL,
    params: z.infer<TParamsSchema>,
    context: RequestContext,
  ): Promise<z.infer<TOutputSchema>>;
}

export type AnyResourceDefinition = ResourceDefinition<
  z.AnyZodObject,
  z.AnyZodObject
>;
