import pino from 'pino';
import { mkdirSync } from 'fs';
import path from 'path';
import { config } from '../config/env';

const baseOptions: pino.LoggerOptions = {
  level: config.logging.level,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
};

// pino-pretty runs in a worker thread; keep it out of test runs
const usePretty = config.logging.format === 'pretty' && !config.server.isTest;

// Stream entries take no 'silent'; the root level already mutes everything then
const streamLevel: pino.Level = config.logging.level === 'silent' ? 'fatal' : config.logging.level;

const streams: pino.StreamEntry[] = [];

streams.push({
  stream: usePretty
    ? pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      })
    : process.stdout,
  level: streamLevel,
});

// Add file logging if configured
if (config.logging.file) {
  mkdirSync(path.dirname(config.logging.file), { recursive: true });
  streams.push({
    stream: pino.destination({ dest: config.logging.file, sync: false }),
    level: streamLevel,
  });
}

export const logger: pino.Logger =
  streams.length > 1 ? pino(baseOptions, pino.multistream(streams)) : pino(baseOptions, streams[0].stream);

// Create child logger with context
export const createLogger = (context: string) => {
  return logger.child({ context });
};

// Helper for structured error logging
export const logError = (error: Error, context?: Record<string, unknown>) => {
  logger.error(
    {
      err: error,
      ...context,
    },
    error.message
  );
};
