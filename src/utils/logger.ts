/**
 * Logger
 *
 * Line-oriented logger on stderr. stdout belongs to the MCP protocol.
 */

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  error(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Defaults to process.stderr */
  write?: (line: string) => void;
}

const RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

/**
 * Render one log line: `[strata:<scope>] <LEVEL> <message> <json>`
 */
export function formatLogLine(
  scope: string,
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>
): string {
  const prefix = `[strata:${scope}] ${level.toUpperCase()} ${message}`;
  if (!data || Object.keys(data).length === 0) return prefix;
  return `${prefix} ${JSON.stringify(data, errorReplacer)}`;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const scope = options.scope ?? 'core';
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  const emit = (at: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (RANK[at] > RANK[level]) return;
    write(formatLogLine(scope, at, message, data));
  };

  return {
    error: (msg, data) => emit('error', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    info: (msg, data) => emit('info', msg, data),
    debug: (msg, data) => emit('debug', msg, data),
    child: (childScope) =>
      createLogger({ level, scope: `${scope}:${childScope}`, write }),
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
  child: () => silentLogger,
};
