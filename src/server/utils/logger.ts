import pino from 'pino';
import type { Logger } from 'pino';

// Determine environment
const isDevelopment = process.env.NODE_ENV !== 'production';
const LOG_LEVEL = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

type LogContext = Record<string, unknown>;

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,

  ...(isDevelopment ? {} : {
    timestamp: pino.stdTimeFunctions.isoTime,
  }),

  // Base context that will be included in all logs
  base: {
    pid: process.pid,
    hostname: process.env.HOSTNAME || 'localhost',
    service: 'phrasewatch-server',
  },

  // Correction contexts carry the typed window
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie', '*.context.words'],
    remove: true,
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

export const logger = pino(baseConfig);

export const createLogger = (component: string, context?: LogContext): Logger => {
  return logger.child({ component, ...context });
};

// Specific loggers for major components
export const indexLogger = createLogger('phrase-index');
export const scorerLogger = createLogger('match-scorer');
export const assemblerLogger = createLogger('input-assembler');
export const sessionLogger = createLogger('suggestion-session');
export const wsLogger = createLogger('websocket');
export const httpLogger = createLogger('http');
export const startupLogger = createLogger('startup');

export const logPerformance = (
  logger: Logger,
  operation: string,
  startTime: number,
  metadata?: LogContext
) => {
  const duration = Date.now() - startTime;
  logger.info({
    operation,
    duration,
    ...metadata,
  }, `${operation} completed in ${duration}ms`);
};

export const logError = (
  logger: Logger,
  error: Error | unknown,
  context?: LogContext
) => {
  if (error instanceof Error) {
    logger.error({
      err: error,
      ...context,
    }, error.message);
  } else {
    logger.error({
      error: String(error),
      ...context,
    }, 'Unknown error occurred');
  }
};

export type { Logger };
