/**
 * @fileoverview Fetch wrapper that enforces a timeout and turns every failure
 * mode into an {@link McpError}.
 * @module src/utils/network/fetchWithTimeout
 */
import { JsonRpcErrorCode, McpError, errorMessage } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

/**
 * Options for {@link fetchWithTimeout}: standard RequestInit minus `signal`,
 * plus the timeout.
 */
export interface FetchWithTimeoutOptions extends Omit<RequestInit, 'signal'> {
  timeout?: number;
}

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Fetches a resource, aborting after `options.timeout` milliseconds.
 *
 * The deadline covers the body as well as the headers: the body is read in
 * full before the timer is cleared, and the returned Response wraps that
 * buffer. Non-2xx responses are rejected as `ServiceUnavailable` with the
 * HTTP status in `data.statusCode`, so callers can single out a 404. An abort
 * becomes `Timeout`; any other failure becomes `ServiceUnavailable`.
 *
 * @throws {McpError}
 */
export async function fetchWithTimeout(
  url: string | URL,
  options: FetchWithTimeoutOptions = {},
  context?: RequestContext,
): Promise<Response> {
  const { timeout, ...fetchOptions } = options;
  const timeoutMs = timeout ?? DEFAULT_TIMEOUT_MS;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  const urlString = url.toString();
  const operationDescription = `fetch ${fetchOptions.method ?? 'GET'} ${urlString}`;
  const baseData = { ...context, url: urlString };

  logger.debug(
    `Attempting ${operationDescription} with ${timeoutMs}ms timeout.`,
    baseData,
  );

  try {
    const response = await fetch(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
    logger.debug(`Fetched ${urlString}. Status: ${response.status}`, baseData);

    if (!response.ok) {
      throw new McpError(
        JsonRpcErrorCode.ServiceUnavailable,
        `HTTP error! Status: ${response.status} ${response.statusText}`,
        {
          ...baseData,
          errorSource: 'FetchHttpError',
          statusCode: response.status,
          statusText: response.statusText,
        },
      );
    }

    const body = await response.arrayBuffer();
    return new Response(body.byteLength > 0 ? body : null, {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    });
  } catch (error) {
    if (error instanceof McpError) throw error;

    if (error instanceof Error && error.name === 'AbortError') {
      logger.warning(`${operationDescription} timed out after ${timeoutMs}ms.`, {
        ...baseData,
        errorSource: 'FetchTimeout',
      });
      throw new McpError(
        JsonRpcErrorCode.Timeout,
        `${operationDescription} timed out.`,
        { ...baseData, errorSource: 'FetchTimeout', timeoutMs },
        { cause: error },
      );
    }

    const message = errorMessage(error);
    logger.warning(`Network error during ${operationDescription}: ${message}`, {
      ...baseData,
      originalErrorName: error instanceof Error ? error.name : 'UnknownError',
      errorSource: 'FetchNetworkError',
    });
    throw new McpError(
      JsonRpcErrorCode.ServiceUnavailable,
      `Network error during ${operationDescription}: ${message}`,
      { ...baseData, errorSource: 'FetchNetworkError' },
      { cause: error },
    );
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Reads the HTTP status a {@link fetchWithTimeout} rejection carried, if any.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (!(error instanceof McpError)) return undefined;
  const status = error.data?.['statusCode'];
  return typeof status === 'number' ? status : undefined;
}
