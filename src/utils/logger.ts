import { Logger, LogLevel } from '../types/index.js';
import { config } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.app.logLevel]) {
    return;
  }

  const line = `[${level.toUpperCase()}] ${new Date().toISOString()} ${message}`;
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';

  if (level === 'error') {
    console.error(line + suffix);
  } else if (level === 'warn') {
    console.warn(line + suffix);
  } else {
    console.log(line + suffix);
  }
}

export const logger: Logger = {
  debug: (message, meta) => write('debug', message, meta),
  info: (message, meta) => write('info', message, meta),
  warn: (message, meta) => write('warn', message, meta),
  error: (message, meta) => write('error', message, meta),
};

