/**
 * Structured JSON logger.
 * Every line carries the session it belongs to so a run can be traced from the
 * inbound frame through each model round-trip and tool call.
 */

export interface LogContext {
  sessionId?: string;
  userId?: string;
  toolUseId?: string;
  remoteAddress?: string;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function thresholdFromEnv(): number {
  const raw = (process.env.LOG_LEVEL ?? 'INFO').toUpperCase();
  return raw === 'DEBUG' || raw === 'INFO' || raw === 'WARN' || raw === 'ERROR'
    ? LEVEL_ORDER[raw]
    : LEVEL_ORDER.INFO;
}

function formatLog(level: LogLevel, message: string, ctx: LogContext, extra?: Record<string, unknown>): string {
  return JSON.stringify({
    level,
    message,
    ...ctx,
    ...extra,
    ts: new Date().toISOString(),
  });
}

export interface Logger {
  debug(message: string, ctx?: LogContext, extra?: Record<string, unknown>): void;
  info(message: string, ctx?: LogContext, extra?: Record<string, unknown>): void;
  warn(message: string, ctx?: LogContext, extra?: Record<string, unknown>): void;
  error(message: string, ctx?: LogContext, extra?: Record<string, unknown>): void;
  /** Returns a logger that merges `bound` into every line's context. */
  with(bound: LogContext): Logger;
}

function createLogger(bound: LogContext): Logger {
  const write = (level: LogLevel, message: string, ctx: LogContext, extra?: Record<string, unknown>): void => {
    // Read per call so LOG_LEVEL changes (tests, dotenv) take effect.
    if (LEVEL_ORDER[level] < thresholdFromEnv()) {
      return;
    }
    const line = formatLog(level, message, { ...bound, ...ctx }, extra);
    switch (level) {
      case 'DEBUG':
        console.debug(line);
        return;
      case 'INFO':
        console.log(line);
        return;
      case 'WARN':
        console.warn(line);
        return;
      case 'ERROR':
        console.error(line);
        return;
    }
  };

  return {
    debug: (message, ctx = {}, extra) => write('DEBUG', message, ctx, extra),
    info: (message, ctx = {}, extra) => write('INFO', message, ctx, extra),
    warn: (message, ctx = {}, extra) => write('WARN', message, ctx, extra),
    error: (message, ctx = {}, extra) => write('ERROR', message, ctx, extra),
    with: (more) => createLogger({ ...bound, ...more }),
  };
}

export const logger: Logger = createLogger({});
