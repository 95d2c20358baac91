// src/logging.ts
// What: Application logger shared by the API server and the worker.
// How: Creates a pino logger. In development, attempts to use pino-pretty transport for readable logs;
//      tests run silent unless LOG_LEVEL asks otherwise.

import pino, { type Logger, type LoggerOptions } from 'pino';

const env = process.env.NODE_ENV;
const isDev = env !== 'production' && env !== 'test';

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : isDev ? 'debug' : 'info'),
};

let logger: Logger;

// Try pretty transport in development; fall back to standard if unavailable.
if (isDev) {
  try {
    logger = pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: false,
        },
      },
    });
  } catch {
    logger = pino(baseOptions);
  }
} else {
  logger = pino(baseOptions);
}

export default logger;
