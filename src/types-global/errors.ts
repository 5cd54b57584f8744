/**
 * @fileoverview Error codes and the shared error class used across the server.
 * Standard JSON-RPC codes sit alongside server-defined codes in the
 * implementation-reserved range, plus the motif resolution taxonomy.
 * @module src/types-global/errors
 */

/**
 * Error codes carried by {@link McpError}.
 */
export enum JsonRpcErrorCode {
  // Standard JSON-RPC 2.0
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,

  // Server-defined
  ServiceUnavailable = -32000,
  NotFound = -32001,
  Conflict = -32002,
  RateLimited = -32003,
  Timeout = -32004,
  Forbidden = -32005,
  Unauthorized = -32006,
  ValidationError = -32007,
  ConfigurationError = -32008,
  InitializationFailed = -32009,
  SerializationError = -32070,
  UnknownError = -32099,

  // Motif resolution
  MalformedData = -32100,
  UnsupportedTool = -32101,
  InvalidMode = -32102,
}

/**
 * Error raised throughout the application. `data` holds structured context
 * (request id, file name, HTTP status) for logs and error responses.
 */
export class McpError extends Error {
  public readonly code: JsonRpcErrorCode;
  public readonly data?: Record<string, unknown> | undefined;

  constructor(
    code: JsonRpcErrorCode,
    message: string,
    data?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'McpError';
    this.code = code;
    this.data = data;
    Object.setPrototypeOf(this, McpError.prototype);
  }
}

const CONFIGURATION_CODES: ReadonlySet<JsonRpcErrorCode> = new Set([
  JsonRpcErrorCode.UnsupportedTool,
  JsonRpcErrorCode.InvalidMode,
  JsonRpcErrorCode.ConfigurationError,
]);

/**
 * True for usage and configuration mistakes, which must reach the caller
 * instead of folding into an empty result.
 */
export function isConfigurationError(error: unknown): boolean {
  return error instanceof McpError && CONFIGURATION_CODES.has(error.code);
}

/**
 * Extracts a printable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
