/**
 * Application logger
 *
 * Pretty output goes to stderr, leaving stdout to the interactive menus.
 * A JSON copy is appended to LOG_FILE.
 */

import pino, { type Logger } from 'pino';
import { loggingEnv } from '../config/env.js';

function createLogger(): Logger {
  const { LOG_LEVEL: level, LOG_FILE: file, NODE_ENV } = loggingEnv;

  if (NODE_ENV === 'test' || level === 'silent') {
    return pino({ level: 'silent' });
  }

  const transport = pino.transport({
    targets: [
      {
        target: 'pino-pretty',
        level,
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
      {
        target: 'pino/file',
        level,
        options: { destination: file, mkdir: true },
      },
    ],
  });

  return pino({ level }, transport);
}

export const logger = createLogger();
