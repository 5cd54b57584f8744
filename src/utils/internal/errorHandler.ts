/**
 * @fileoverview Normalizes thrown values into {@link McpError} and logs them
 * once, at the boundary where a request fails.
 * @module src/utils/internal/errorHandler
 */
import { ZodError } from 'zod';

import {
  isConfigurationError,
  JsonRpcErrorCode,
  McpError,
  errorMessage,
} from '@/types-global/errors.js';
import { logger } from './logger.js';
import type { RequestContext } from './requestContext.js';

export interface HandleErrorOptions {
  operation: string;
  context?: RequestContext;
  input?: unknown;
}

export const ErrorHandler = {
  /**
   * Maps any thrown value onto an McpError. Zod failures become
   * `InvalidParams`; unknown errors become `InternalError`.
   */
  toMcpError(error: unknown): McpError {
    if (error instanceof McpError) return error;
    if (error instanceof ZodError) {
      return new McpError(
        JsonRpcErrorCode.InvalidParams,
        `Invalid input: ${error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ')}`,
        { issues: error.issues.length },
        { cause: error },
      );
    }
    return new McpError(
      JsonRpcErrorCode.InternalError,
      errorMessage(error),
      undefined,
      { cause: error },
    );
  },

  /**
   * Normalizes and logs `error`. Caller mistakes log at `warning`, anything
   * else at `error`.
   */
  handleError(error: unknown, options: HandleErrorOptions): McpError {
    const mcpError = ErrorHandler.toMcpError(error);
    const callerMistake =
      isConfigurationError(mcpError) ||
      mcpError.code === JsonRpcErrorCode.InvalidParams;
    const logContext = {
      ...options.context,
      operation: options.operation,
      errorCode: mcpError.code,
      errorData: mcpError.data,
      input: options.input,
    };
    const message = `Error in ${options.operation}: ${mcpError.message}`;
    if (callerMistake) {
      logger.warning(message, logContext);
    } else {
      logger.error(message, { ...logContext, error: mcpError });
    }
    return mcpError;
  },
};
