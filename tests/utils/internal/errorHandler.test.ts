/**
 * @fileoverview Unit tests for error normalization at the request boundary.
 * @module tests/utils/internal/errorHandler.test
 */
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { z } from 'zod';

import {
  isConfigurationError,
  JsonRpcErrorCode,
  McpError,
} from '@/types-global/errors.js';
import { ErrorHandler, logger, type Logger } from '@/utils/index.js';
import { testContext } from '../../helpers.js';

describe('ErrorHandler.handleError', () => {
  let warning: MockInstance<Logger['warning']>;
  let error: MockInstance<Logger['error']>;

  beforeEach(() => {
    warning = vi.spyOn(logger, 'warning').mockImplementation(() => {});
    error = vi.spyOn(logger, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log configuration errors as caller mistakes', () => {
    const original = new McpError(JsonRpcErrorCode.InvalidMode, 'Unknown source mode "x".');

    const handled = ErrorHandler.handleError(original, {
      operation: 'tool:motif_set_source',
      context: testContext,
    });

    expect(handled).toBe(original);
    expect(warning).toHaveBeenCalledWith(
      'Error in tool:motif_set_source: Unknown source mode "x".',
      expect.objectContaining({ errorCode: JsonRpcErrorCode.InvalidMode }),
    );
    expect(error).not.toHaveBeenCalled();
  });

  it('should log invalid input as a caller mistake', () => {
    const parsed = z.object({ pdbId: z.string() }).safeParse({});
    if (parsed.success) throw new Error('expected a validation failure');

    const handled = ErrorHandler.handleError(parsed.error, { operation: 'tool:motif_resolve' });

    expect(handled.code).toBe(JsonRpcErrorCode.InvalidParams);
    expect(handled.message).toBe('Invalid input: pdbId: Required');
    expect(warning).toHaveBeenCalledTimes(1);
  });

  it('should log anything else as an error', () => {
    const handled = ErrorHandler.handleError(new Error('disk gone'), {
      operation: 'resource:motif-annotations',
    });

    expect(handled.code).toBe(JsonRpcErrorCode.InternalError);
    expect(handled.message).toBe('disk gone');
    expect(error).toHaveBeenCalledTimes(1);
    expect(warning).not.toHaveBeenCalled();
  });
});

describe('isConfigurationError', () => {
  it('should accept only the codes that must reach the caller', () => {
    expect(isConfigurationError(new McpError(JsonRpcErrorCode.UnsupportedTool, 'x'))).toBe(true);
    expect(isConfigurationError(new McpError(JsonRpcErrorCode.ConfigurationError, 'x'))).toBe(true);
    expect(isConfigurationError(new McpError(JsonRpcErrorCode.NotFound, 'x'))).toBe(false);
    expect(isConfigurationError(new Error('x'))).toBe(false);
  });
});
