import { destination, pino } from 'pino';
import { config } from '../config.js';

/** Logs go to stderr; stdout is reserved for command output. */
export const logger = pino(
  {
    name: 'wayback-snapshots',
    level: config.LOG_LEVEL,
  },
  destination(2),
);

export type { Logger } from 'pino';
