/**
 * @fileoverview Application logger built on pino. Exposes syslog-style level
 * names (`notice`, `warning`, `crit`) on top of pino's levels and always writes
 * to stderr, leaving stdout to the MCP stdio transport.
 * @module src/utils/internal/logger
 */
import pino, { type Level, type Logger as PinoLogger } from 'pino';

import { config, type LogLevel } from '@/config/index.js';

/**
 * Structured fields attached to a log line. Usually a spread
 * {@link RequestContext} plus operation-specific keys.
 */
export type LogContext = Record<string, unknown>;

const PINO_LEVELS: Record<LogLevel, Level> = {
  debug: 'debug',
  info: 'info',
  notice: 'info',
  warning: 'warn',
  error: 'error',
  crit: 'fatal',
};

function normalizeContext(context?: LogContext): LogContext {
  if (!context) return {};
  const { error, ...rest } = context;
  if (error instanceof Error) {
    return { ...rest, err: error };
  }
  return error === undefined ? rest : { ...rest, error };
}

export class Logger {
  private readonly pinoLogger: PinoLogger;

  constructor(level: LogLevel, destination = pino.destination(2)) {
    this.pinoLogger = pino(
      {
        level: PINO_LEVELS[level],
        base: { service: config.serverName },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      destination,
    );
  }

  setLevel(level: LogLevel): void {
    this.pinoLogger.level = PINO_LEVELS[level];
  }

  debug(message: string, context?: LogContext): void {
    this.pinoLogger.debug(normalizeContext(context), message);
  }

  info(message: string, context?: LogContext): void {
    this.pinoLogger.info(normalizeContext(context), message);
  }

  notice(message: string, context?: LogContext): void {
    this.pinoLogger.info({ ...normalizeContext(context), notice: true }, message);
  }

  warning(message: string, context?: LogContext): void {
    this.pinoLogger.warn(normalizeContext(context), message);
  }

  error(message: string, context?: LogContext): void {
    this.pinoLogger.error(normalizeContext(context), message);
  }

  crit(message: string, context?: LogContext): void {
    this.pinoLogger.fatal(normalizeContext(context), message);
  }
}

export const logger = new Logger(config.logLevel);
