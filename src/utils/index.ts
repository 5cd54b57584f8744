/**
 * @fileoverview Barrel export for shared utilities.
 * @module src/utils/index
 */
export {
  ErrorHandler,
  type HandleErrorOptions,
} from './internal/errorHandler.js';
export { logger, Logger, type LogContext } from './internal/logger.js';
export {
  requestContextService,
  type RequestContext,
} from './internal/requestContext.js';
export {
  fetchWithTimeout,
  httpStatusOf,
  type FetchWithTimeoutOptions,
} from './network/fetchWithTimeout.js';
export { withTimeout } from './network/withTimeout.js';
