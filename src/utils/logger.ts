import pino from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  level: config.server.logLevel,
  base: { service: 'incident-report-service', env: config.server.nodeEnv },
  transport:
    config.server.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,service,env',
          },
        }
      : undefined,
});
