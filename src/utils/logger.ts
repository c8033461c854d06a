import pino from 'pino';
import { config } from '../config/index.js';

// stderr keeps stdout free for CLI output
export const logger =
  config.runtime.nodeEnv === 'development'
    ? pino({
        level: config.runtime.logLevel,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      })
    : pino({ level: config.runtime.logLevel }, pino.destination(2));
