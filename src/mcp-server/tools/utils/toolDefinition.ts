/**
 * @fileoverview Shape of a declarative tool definition. Each tool module
 * exports one of these; the server registers them uniformly.
 * @module src/mcp-server/tools/utils/toolDefinition
 */
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type {
  ContentBlock,
  ServerNotification,
  ServerRequest,
} from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';

import type { RequestContext } from '@/utils/index.js';

/**
 * Per-request handle the SDK passes to tool and resource callbacks.
 */
export type SdkContext = RequestHandlerExtra<ServerRequest, ServerNotification>;

/**
 * Behavioural hints advertised to clients.
 */
export interface ToolAnnotations {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface ToolDefinition<
  TInputSchema extends z.AnyZodObject,
  TOutputSchema extends z.AnyZodObject,
> {
  /** Programmatic name, snake_case. */
  name: string;
  /** Human-readable title for UIs. */
  title: string;
  /** Shown to the model; says what the tool does and when to use it. */
  description: string;
  inputSchema: TInputSchema;
  outputSchema: TOutputSchema;
  annotations: ToolAnnotations;

  /**
   * Pure business logic. Throws {@link McpError} on failure; the
   * registration layer turns errors into tool error results.
   */
  logic(
    input: z.infer<TInputSchema>,
    appContext: RequestContext,
    sdkContext: SdkContext,
  ): Promise<z.infer<TOutputSchema>>;

  /** Text rendering of a successful result. */
  responseFormatter?(result: z.infer<TOutputSchema>): ContentBlock[];
}

export type AnyToolDefinition = ToolDefinition<z.AnyZodObject, z.AnyZodObject>;
