// Process-wide pino logger. Writes to stderr so stdout only carries results;
// pino-pretty is used for interactive development sessions.

import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

const baseOptions: pino.LoggerOptions = {
  name: 'kdrama-recommender',
  level: process.env.LOG_LEVEL || 'info',
};

function createLogger(): pino.Logger {
  if (isDev && process.stderr.isTTY) {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: false,
        },
      },
    });
  }
  return pino(baseOptions, pino.destination(2));
}

const logger = createLogger();

export default logger;
