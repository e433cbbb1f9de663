/**
 * Structured logger.
 *
 * JSON lines in production, colored single lines elsewhere. Metadata objects
 * are merged into the entry; an `error` value in metadata is expanded into
 * name/message/stack.
 */

import { types } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  component?: string;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const BRIGHT = '\x1b[1m';

const settings: { level: LogLevel; format: LogFormat } = {
  level: 'info',
  format: 'pretty',
};

export function configureLogger(options: { level?: LogLevel; format?: LogFormat }): void {
  if (options.level) settings.level = options.level;
  if (options.format) settings.format = options.format;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error || types.isNativeError(error)) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, ...meta } = entry;
  const color = LOG_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);
  const path = component ? `${service}:${component}` : service;
  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : '';

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${path}]${RESET} ${message}${metaStr}`;
}

function output(entry: LogEntry): void {
  const formatted = settings.format === 'json' ? JSON.stringify(entry) : formatPretty(entry);

  switch (entry.level) {
    case 'debug':
      console.debug(formatted);
      break;
    case 'info':
      console.info(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    case 'error':
      console.error(formatted);
      break;
  }
}

export class Logger {
  constructor(
    private readonly service: string,
    private readonly component?: string
  ) {}

  private log(level: LogLevel, message: string, meta?: LogContext): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[settings.level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...meta,
    };
    if (this.component) {
      entry.component = this.component;
    }
    if (meta && 'error' in meta) {
      entry.error = serializeError(meta.error);
    }

    output(entry);
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogContext): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: LogContext): void {
    this.log('error', message, meta);
  }

  child(component: string): Logger {
    return new Logger(this.service, this.component ? `${this.component}:${component}` : component);
  }
}

export const logger = new Logger('catalog-api');
