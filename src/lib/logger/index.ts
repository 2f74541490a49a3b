/**
 * Namespaced structured logger.
 *
 * Env:
 *  - LOG_ENABLED=0            -> disable logs (default: enabled)
 *  - LOG_LEVEL=debug|info|... -> min level (default: info)
 *  - LOG_JSON=1               -> JSON lines (default: pretty text)
 *  - LOG_SERVICE_NAME=nvme    -> service tag (optional)
 */

export type LevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogMeta {
  [key: string]: unknown;
  error?: unknown;
  err?: unknown;
}

export interface Logger {
  trace(message: unknown, meta?: LogMeta): void;
  debug(message: unknown, meta?: LogMeta): void;
  info(message: unknown, meta?: LogMeta): void;
  warn(message: unknown, meta?: LogMeta): void;
  error(message: unknown, meta?: LogMeta): void;
  child(namespace: string | string[]): Logger;
}

export type LogRecord = {
  ts: string;
  level: LevelName;
  ns?: string;
  service?: string;
  pid: number;
  msg: string;
  meta?: LogMeta;
};

export type LoggerOptions = {
  enabled: boolean;
  level: LevelName;
  json: boolean;
  service: string;
  /** Receives every formatted line; defaults to the console stream for the level. */
  sink?: (level: LevelName, line: string) => void;
};

const LEVELS: Record<LevelName, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const isLevelName = (value: string): value is LevelName => value in LEVELS;

export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const level = (env.LOG_LEVEL || 'info').toLowerCase();
  return {
    enabled: env.LOG_ENABLED !== '0',
    level: isLevelName(level) ? level : 'info',
    json: env.LOG_JSON === '1',
    service: env.LOG_SERVICE_NAME || '',
  };
}

function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err;
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(err)) {
    if (key !== 'message' && key !== 'name' && key !== 'stack') extra[key] = value;
  }
  return { message: err.message, name: err.name, stack: err.stack, ...extra };
}

function safeStringify(obj: unknown): string {
  try {
    return JSON.stringify(obj);
  } catch {
    return '{"_":"[unserializable]"}';
  }
}

function consoleSink(level: LevelName, line: string): void {
  if (LEVELS[level] >= LEVELS.error) {
    console.error(line);
  } else if (LEVELS[level] >= LEVELS.warn) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function formatRecord(record: LogRecord, json: boolean): string {
  if (json) {
    const meta = record.meta
      ? { ...record.meta, error: serializeError(record.meta.error), err: serializeError(record.meta.err) }
      : undefined;
    return safeStringify({ ...record, meta });
  }

  const tags = [
    `[${record.ts}]`,
    record.service && `[${record.service}]`,
    `[${record.level.toUpperCase()}]`,
    record.ns && `[${record.ns}]`,
  ]
    .filter(Boolean)
    .join(' ');
  const tail = record.meta ? ` ${safeStringify(record.meta)}` : '';
  return `${tags} ${record.msg}${tail}`;
}

export function createLogger(options: LoggerOptions, ns: string[] = []): Logger {
  const namespace = ns.join(':');
  const sink = options.sink ?? consoleSink;
  const minLevel = LEVELS[options.level];

  const write = (level: LevelName, msg: unknown, meta?: LogMeta) => {
    if (!options.enabled || LEVELS[level] < minLevel) return;
    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      ns: namespace || undefined,
      service: options.service || undefined,
      pid: process.pid,
      msg: String(msg ?? ''),
      ...(meta ? { meta } : {}),
    };
    sink(level, formatRecord(record, options.json));
  };

  return {
    trace: (m, meta) => write('trace', m, meta),
    debug: (m, meta) => write('debug', m, meta),
    info: (m, meta) => write('info', m, meta),
    warn: (m, meta) => write('warn', m, meta),
    error: (m, meta) => write('error', m, meta),
    child: (sub) => createLogger(options, [...ns, ...(Array.isArray(sub) ? sub : [sub])]),
  };
}

const logger = createLogger(optionsFromEnv());

export default logger;
