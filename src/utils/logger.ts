/**
 * stderr logger for codespec.
 *
 * stdout carries the MCP stdio transport, so every line goes to stderr as
 * `TIMESTAMP LEVEL message {json context}`.
 */

import chalk from 'chalk';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogContext = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 };

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  DEBUG: chalk.gray,
  INFO: chalk.blue,
  WARN: chalk.yellow,
  ERROR: chalk.red,
};

const isLogLevel = (value: string): value is LogLevel => Object.keys(SEVERITY).includes(value);

class Logger {
  private level: LogLevel = 'INFO';
  private colors = true;

  setLevel = (level: LogLevel): void => {
    this.level = level;
  };

  setColors = (enabled: boolean): void => {
    this.colors = enabled;
  };

  isEnabled = (level: LogLevel): boolean => SEVERITY[level] >= SEVERITY[this.level];

  /** Builds one log line without writing it. */
  format = (level: LogLevel, message: string, context?: LogContext): string => {
    const paint = (color: (text: string) => string, text: string): string => (this.colors ? color(text) : text);
    const parts = [paint(chalk.gray, new Date().toISOString()), paint(LEVEL_COLOR[level], level), message];
    if (context && Object.keys(context).length > 0) {
      parts.push(paint(chalk.gray, JSON.stringify(context)));
    }
    return parts.join(' ');
  };

  private write = (level: LogLevel, message: string, context?: LogContext): void => {
    if (this.isEnabled(level)) {
      console.error(this.format(level, message, context));
    }
  };

  debug = (message: string, context?: LogContext): void => this.write('DEBUG', message, context);
  info = (message: string, context?: LogContext): void => this.write('INFO', message, context);
  warn = (message: string, context?: LogContext): void => this.write('WARN', message, context);
  error = (message: string, context?: LogContext): void => this.write('ERROR', message, context);

  errorWithStack = (message: string, error: Error, context?: LogContext): void => {
    this.error(message, { ...context, error: error.message, stack: error.stack });
  };

  startup = (info: { version: string; llmBackend: string; retrievalBackend: string }): void => {
    if (!this.isEnabled('INFO')) {
      return;
    }
    const title = `codespec ${info.version} :: specification extraction over embedded code`;
    const rule = '='.repeat(title.length);
    console.error(this.colors ? chalk.cyan(`${rule}\n${title}\n${rule}`) : `${rule}\n${title}\n${rule}`);
    this.info('Server starting', { llm: info.llmBackend, retrieval: info.retrievalBackend });
  };

  shutdown = (): void => {
    this.info('Server shutting down');
  };

  connected = (service: string, details?: LogContext): void => {
    this.info(`Connected to ${service}`, details);
  };

  healthCheck = (service: string, status: 'OK' | 'FAILED', details?: LogContext): void => {
    if (status === 'OK') {
      this.info(`Health check: ${service} OK`, details);
    } else {
      this.error(`Health check: ${service} FAILED`, details);
    }
  };

  /** Pipeline progress for one codebase, e.g. `[billing] server {"chunks":12}`. */
  stage = (codebase: string, stage: string, details?: LogContext): void => {
    this.info(`[${codebase}] ${stage}`, details);
  };
}

export const logger = new Logger();

/**
 * Applies a level name such as the LOG_LEVEL variable. Unknown or missing
 * names leave INFO in place.
 */
export const initLogger = (level?: string): LogLevel => {
  const normalized = level?.trim().toUpperCase() ?? '';
  const resolved = isLogLevel(normalized) ? normalized : 'INFO';
  if (level && resolved !== normalized) {
    logger.warn('Unknown log level, using INFO', { level });
  }
  logger.setLevel(resolved);
  return resolved;
};
