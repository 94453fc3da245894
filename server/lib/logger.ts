import pino, { LoggerOptions } from 'pino';
import { loadConfig } from '../config';

const config = loadConfig();
const usePretty = config.nodeEnv !== 'production' && config.nodeEnv !== 'test';

export const loggerOptions: LoggerOptions = {
  level: config.logLevel,
  ...(usePretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
};

export const logger = pino(loggerOptions);
