import pino from 'pino';
import { resolveLogLevel, setLoggerTransport, type LoggerTransport } from '@serppro/shared';

// Pino logger for the client; level comes from LOG_LEVEL
export const logger = pino({
  name: 'serppro-client',
  level: resolveLogLevel(process.env.LOG_LEVEL),
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export const pinoTransport: LoggerTransport = {
  debug: (obj, msg) => logger.debug(obj, msg),
  info: (obj, msg) => logger.info(obj, msg),
  warn: (obj, msg) => logger.warn(obj, msg),
  error: (obj, msg) => logger.error(obj, msg),
};

// Route shared-package logs through pino for unified structured logging
setLoggerTransport(pinoTransport);
