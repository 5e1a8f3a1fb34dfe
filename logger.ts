import 'dotenv/config';
import { destination, pino, type LevelWithSilent } from 'pino';

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

const resolveLevel = (value: string | undefined): LevelWithSilent | undefined =>
  LOG_LEVELS.find((level) => level === value);

const requestedLevel = process.env.LOG_LEVEL;
const level = resolveLevel(requestedLevel) ?? 'info';
const prettyLogs = process.env.NODE_ENV !== 'production' && process.env.LOG_PRETTY !== 'false';

/**
 * Shared structured logger.
 *
 * Writes to stderr so that stdout carries only the alert report. Reads only
 * `LOG_LEVEL`, `LOG_PRETTY` and `NODE_ENV`, and never throws on them: an
 * unknown level falls back to `info`.
 */
export const logger = prettyLogs
  ? pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2, colorize: true, translateTime: 'SYS:standard' },
      },
    })
  : pino({ level }, destination(2));

if (requestedLevel !== undefined && requestedLevel !== '' && requestedLevel !== level) {
  logger.warn({ LOG_LEVEL: requestedLevel }, 'Unknown log level, falling back to info');
}
