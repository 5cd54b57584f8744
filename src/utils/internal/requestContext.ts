/**
 * @fileoverview Request context creation. A context travels with every
 * operation so log lines from providers, the cache and the selector can be
 * correlated.
 * @module src/utils/internal/requestContext
 */
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  requestId: string;
  timestamp: string;
  operation?: string;
  [key: string]: unknown;
}

export const requestContextService = {
  /**
   * Creates a context with a fresh request id. Extra fields are copied in;
   * a `parentContext` keeps the parent's request id.
   */
  createRequestContext(
    fields: {
      operation?: string;
      parentContext?: RequestContext;
      [key: string]: unknown;
    } = {},
  ): RequestContext {
    const { parentContext, ...rest } = fields;
    return {
      ...rest,
      requestId: parentContext?.requestId ?? randomUUID(),
      timestamp: new Date().toISOString(),
    };
  },
};
