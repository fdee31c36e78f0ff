import pino from 'pino';
import { config } from '../config/index.js';

const level = config.server.logLevel ?? (config.server.nodeEnv === 'test' ? 'silent' : 'info');

export const logger = pino({
  level,
  transport:
    config.server.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});
