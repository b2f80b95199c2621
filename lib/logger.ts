import chalk from 'chalk';
import { Config } from './config';

export type LogLevel = Config['logLevel'];
type Meta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: Meta): void;
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
  withContext(context: Meta): Logger;
}

const PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

const COLORS: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red
};

const formatMeta = (meta?: Meta) => (meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '');

export const formatLine = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: Meta) =>
  `${COLORS[level](`[${level.toUpperCase()}]`)} ${message}${formatMeta(meta)}`;

/**
 * Everything goes to stderr; stdout is reserved for the report.
 */
export function createLogger(
  level: LogLevel,
  context: Meta = {},
  write: (line: string) => void = line => console.error(line)
): Logger {
  const log = (target: Exclude<LogLevel, 'silent'>, message: string, meta?: Meta) => {
    if (PRIORITY[target] < PRIORITY[level]) return;
    write(formatLine(target, message, { ...context, ...meta }));
  };
  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    withContext: extra => createLogger(level, { ...context, ...extra }, write)
  };
}

export const silentLogger = createLogger('silent');
