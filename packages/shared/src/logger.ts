/**
 * Structured Logging with Correlation IDs
 *
 * One JSON object per line. Context fields (run, document, strategy, job)
 * come from AsyncLocalStorage. LOG_LEVEL sets the threshold: debug, info
 * (default), warn, error or silent.
 */

import { getContext, getCorrelationId } from './context';
import { toErrorTag } from './errors';

export interface LogContext {
  [key: string]: unknown;
}

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<string, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function threshold(): number {
  return LEVEL_RANK[(process.env.LOG_LEVEL || 'info').toLowerCase()] ?? LEVEL_RANK.info;
}

function enabled(level: Level): boolean {
  return LEVEL_RANK[level.toLowerCase()] >= threshold();
}

function formatLog(level: Level, message: string, context?: LogContext): string {
  const reqContext = getContext();

  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    runId: reqContext?.runId,
    documentId: reqContext?.documentId,
    strategy: reqContext?.strategy,
    jobId: reqContext?.jobId,
    message,
    ...context,
  });
}

function describeError(error: unknown): LogContext {
  const tag = toErrorTag(error);
  return {
    kind: tag.kind,
    message: tag.message,
    reason: tag.reason,
    stack: error instanceof Error ? error.stack : undefined,
  };
}

export const logger = {
  debug: (message: string, context?: LogContext) => {
    if (enabled('DEBUG')) console.debug(formatLog('DEBUG', message, context));
  },

  info: (message: string, context?: LogContext) => {
    if (enabled('INFO')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('WARN')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    if (!enabled('ERROR')) return;
    const errorContext = error === undefined ? context : { ...context, error: describeError(error) };
    console.error(formatLog('ERROR', message, errorContext));
  },
};
