import { config, LogLevel } from '../config';

export interface LogContext {
  details?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function formatLogLine(level: LogLevel, category: string, message: string, context?: LogContext): string {
  let line = `[${level.toUpperCase()}] [${category}] ${message}`;
  if (context?.details && Object.keys(context.details).length > 0) {
    line += ` ${JSON.stringify(context.details)}`;
  }
  return line;
}

class StructuredLogger {
  constructor(private level: LogLevel) {}

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(level: LogLevel, category: string, message: string, context?: LogContext) {
    if (!this.isEnabled(level)) {
      return;
    }
    const line = formatLogLine(level, category, message, context);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  debug(category: string, message: string, context?: LogContext) {
    this.write('debug', category, message, context);
  }

  info(category: string, message: string, context?: LogContext) {
    this.write('info', category, message, context);
  }

  warn(category: string, message: string, context?: LogContext) {
    this.write('warn', category, message, context);
  }

  error(category: string, message: string, context?: LogContext) {
    this.write('error', category, message, context);
  }
}

export const logger = new StructuredLogger(config.logLevel);
