/**
 * @fileoverview Builds the MCP server and registers every tool and resource
 * definition on it. Transport-agnostic; the entry point connects stdio.
 * @module src/mcp-server/server
 */
import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type {
  CallToolResult,
  ReadResourceResult,
} from '@modelcontextprotocol/sdk/types.js';

import { config } from '@/config/index.js';
import { allResourceDefinitions } from '@/mcp-server/resources/definitions/index.js';
import type { AnyResourceDefinition } from '@/mcp-server/resources/utils/resourceDefinition.js';
import { allToolDefinitions } from '@/mcp-server/tools/definitions/index.js';
import type {
  AnyToolDefinition,
  SdkContext,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import {
  ErrorHandler,
  logger,
  requestContextService,
  type RequestContext,
} from '@/utils/index.js';

/**
 * Validates input, runs the tool's logic and renders the result. Failures
 * come back as an error result instead of a protocol error, so the model
 * sees the message.
 */
export async function handleToolCall(
  tool: AnyToolDefinition,
  args: unknown,
  sdkContext: SdkContext,
  parentContext?: RequestContext,
): Promise<CallToolResult> {
  const context = requestContextService.createRequestContext({
    operation: 'HandleToolRequest',
    toolName: tool.name,
    ...(parentContext ? { parentContext } : {}),
  });

  try {
    const input = await tool.inputSchema.parseAsync(args);
    const result = await tool.logic(input, context, sdkContext);
    return {
      structuredContent: result,
      content: tool.responseFormatter?.(result) ?? [
        { type: 'text', text: JSON.stringify(result, null, 2) },
      ],
    };
  } catch (error) {
    const mcpError = ErrorHandler.handleError(error, {
      operation: `tool:${tool.name}`,
      context,
      input: args,
    });
    return {
      isError: true,
      content: [
        {
          type: 'text',
          text: `Error ${mcpError.code}: ${mcpError.message}`,
        },
      ],
    };
  }
}

/**
 * Parses template variables and runs the resource's logic.
 * @throws {McpError} normalized from any failure.
 */
export async function handleResourceRead(
  resource: AnyResourceDefinition,
  uri: URL,
  variables: Record<string, string | string[]>,
): Promise<ReadResourceResult> {
  const context = requestContextService.createRequestContext({
    operation: 'HandleResourceRead',
    resourceName: resource.name,
    resourceUri: uri.href,
  });

  try {
    const params = await resource.paramsSchema.parseAsync(variables);
    const result = await resource.logic(uri, params, context);
    return {
      contents: [
        {
          uri: uri.href,
          mimeType: resource.mimeType,
          text: JSON.stringify(result),
        },
      ],
    };
  } catch (error) {
    throw ErrorHandler.handleError(error, {
      operation: `resource:${resource.name}`,
      context,
      input: variables,
    });
  }
}

export function createMcpServer(): McpServer {
  const server = new McpServer(
    { name: config.serverName, version: config.serverVersion },
    { capabilities: { logging: {} } },
  );

  for (const tool of allToolDefinitions) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: tool.inputSchema.shape,
        outputSchema: tool.outputSchema.shape,
        annotations: tool.annotations,
      },
      (args: Record<string, unknown>, extra: SdkContext) =>
        handleToolCall(tool, args, extra),
    );
  }

  for (const resource of allResourceDefinitions) {
    server.registerResource(
      resource.name,
      new ResourceTemplate(resource.uriTemplate, { list: undefined }),
      {
        title: resource.title,
        description: resource.description,
        mimeType: resource.mimeType,
      },
      (uri: URL, variables: Record<string, string | string[]>) =>
        handleResourceRead(resource, uri, variables),
    );
  }

  logger.info('MCP server created', {
    tools: allToolDefinitions.map((tool) => tool.name),
    resources: allResourceDefinitions.map((resource) => resource.uriTemplate),
  });
  return server;
}
