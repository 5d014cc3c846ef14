/**
 * Requirements addressed:
 * - Diagnostics are reported through an injected logger created once per
 *   invocation (no process-wide singleton).
 * - Minimum level from `WORKSPACE_LOG_LEVEL` (debug|info|warn|error; default
 *   info).
 * - Timed phases log their elapsed milliseconds.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogEntry = {
  ts: string;
  level: LogLevel;
  component: string;
  message: string;
};

export type LogSink = (entry: LogEntry) => void;

export type Logger = {
  readonly component: string;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  child: (component: string) => Logger;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const isLogLevel = (v: string): v is LogLevel => v in LEVEL_ORDER;

export const levelFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
): LogLevel => {
  const raw = (env.WORKSPACE_LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
};

export const formatLogEntry = (e: LogEntry): string =>
  `[${e.ts}] [${e.level.toUpperCase().padEnd(5)}] [${e.component}] ${e.message}`;

export const stderrSink: LogSink = (entry) => {
  process.stderr.write(`${formatLogEntry(entry)}\n`);
};

export const createLogger = (
  component: string,
  opts: { sink?: LogSink; level?: LogLevel } = {},
): Logger => {
  const sink = opts.sink ?? stderrSink;
  const min = LEVEL_ORDER[opts.level ?? levelFromEnv()];

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < min) return;
    sink({ ts: new Date().toISOString(), level, component, message });
  };

  return {
    component,
    debug: (m) => emit('debug', m),
    info: (m) => emit('info', m),
    warn: (m) => emit('warn', m),
    error: (m) => emit('error', m),
    child: (name) =>
      createLogger(`${component}:${name}`, { sink, level: opts.level }),
  };
};

export const logTimedAsync = async <T>(
  logger: Logger,
  description: string,
  fn: () => Promise<T>,
): Promise<T> => {
  const start = performance.now();
  const result = await fn();
  const ms = Math.round(performance.now() - start);
  logger.info(`${description}, took ${String(ms)}ms`);
  return result;
};
