import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LoggerState {
  level: LogLevel;
  configured: boolean;
}

const state: LoggerState = {
  level: process.env.DEBUG ? 'debug' : 'info',
  configured: false,
};

/**
 * One-time setup for the process-wide logger. The first call wins; later calls
 * are ignored so a library caller cannot re-level the CLI mid-run.
 * Returns whether this call took effect.
 */
export function configureLogger(options: { level?: LogLevel }): boolean {
  if (state.configured) return false;
  state.configured = true;
  if (options.level) state.level = options.level;
  return true;
}

export function getLogLevel(): LogLevel {
  return state.level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[state.level];
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value === undefined) return 'undefined';
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts = Object.entries(fields).map(([key, value]) => `${key}=${formatValue(value)}`);
  return parts.join(' ');
}

function withFields(msg: string, fields?: LogFields): string {
  const rendered = formatFields(fields);
  return rendered ? `${msg} ${chalk.gray(rendered)}` : msg;
}

export const logger = {
  info(msg: string, fields?: LogFields) {
    if (enabled('info')) console.log(chalk.blue('ℹ'), withFields(msg, fields));
  },

  success(msg: string, fields?: LogFields) {
    if (enabled('info')) console.log(chalk.green('✔'), withFields(msg, fields));
  },

  warn(msg: string, fields?: LogFields) {
    if (enabled('warn')) console.log(chalk.yellow('⚠'), withFields(msg, fields));
  },

  error(msg: string, fields?: LogFields) {
    if (enabled('error')) console.error(chalk.red('✖'), withFields(msg, fields));
  },

  debug(msg: string, fields?: LogFields) {
    if (enabled('debug')) console.log(chalk.gray('⚙'), chalk.gray(withFields(msg, fields)));
  },

  header(msg: string) {
    if (!enabled('info')) return;
    console.log();
    console.log(chalk.bold(msg));
    console.log();
  },

  dim(msg: string) {
    if (enabled('info')) console.log(chalk.dim(msg));
  },

  fileCreated(path: string) {
    if (enabled('info')) console.log(chalk.green('  + Created:'), path);
  },

  fileModified(path: string) {
    if (enabled('info')) console.log(chalk.yellow('  ~ Modified:'), path);
  },
};
