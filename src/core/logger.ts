import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_STYLE: Record<Exclude<LogLevel, 'silent'>, chalk.Chalk> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export type LogMeta = Record<string, unknown>;
export type LogSink = (line: string) => void;

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.INVX_LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

// stderr keeps stdout free for --json output
const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? levelFromEnv();
  const sink = options.sink ?? stderrSink;

  const write = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta) => {
    if (LEVEL_RANK[entryLevel] < LEVEL_RANK[level]) return;

    const time = new Date().toISOString().slice(11, 23);
    const label = LEVEL_STYLE[entryLevel](entryLevel.toUpperCase().padEnd(5));
    let line = `${chalk.dim(time)} ${label} ${chalk.cyan(`[${scope}]`)} ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ' ' + chalk.dim(JSON.stringify(meta));
    }
    sink(line);
  };

  return {
    scope,
    level,
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, sink }),
  };
}
