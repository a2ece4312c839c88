import pino, { type Logger, type LoggerOptions } from 'pino';

export interface LogContext {
  component?: string;
  experimentId?: string;
  [key: string]: unknown;
}

const defaultOptions: LoggerOptions = {
  level: process.env['LOG_LEVEL'] || 'info',
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
    }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['password', 'token', 'accessToken', 'apiKey', 'secret', 'authorization', 'cookie'],
    remove: true,
  },
};

// Pretty print in development
const devOptions: LoggerOptions = {
  ...defaultOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  },
};

/**
 * Create a logger instance
 */
export function createLogger(name: string, options?: LoggerOptions): Logger {
  const isDev = process.env['NODE_ENV'] === 'development';
  const baseOptions = isDev ? devOptions : defaultOptions;

  return pino({
    ...baseOptions,
    ...options,
    name,
  });
}

/**
 * Create a child logger with context
 */
export function createChildLogger(logger: Logger, context: LogContext): Logger {
  return logger.child(context);
}

/**
 * Root logger instance
 */
export const logger = createLogger('chaosline');

/**
 * Audit logger for fault-injection lifecycle events
 */
export const auditLogger = createLogger('chaosline:audit', {
  level: 'info',
  // Audit trail is used for manual remediation, keep it whole
  redact: undefined,
});

/**
 * Log an audit event
 */
export function logAuditEvent(
  action: string,
  target: {
    type: string;
    id: string;
  },
  details?: Record<string, unknown>,
  status: 'success' | 'failure' = 'success'
): void {
  auditLogger.info({
    type: 'audit',
    action,
    target,
    details,
    status,
    timestamp: new Date().toISOString(),
  });
}

export type { Logger, LoggerOptions };
