export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  readonly name: string;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && value in LEVEL_RANK;

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

const serializeError = (value: unknown): unknown => {
  if (!(value instanceof Error)) return value;
  return { name: value.name, message: value.message, stack: value.stack };
};

const write = (
  level: LogLevel,
  logger: string,
  message: string,
  fields?: LogFields,
) => {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;

  const extra: LogFields = {};
  for (const [key, value] of Object.entries(fields ?? {})) {
    extra[key] = serializeError(value);
  }

  const line = JSON.stringify({
    type: 'qp.log',
    ts: new Date().toISOString(),
    level,
    logger,
    message,
    ...extra,
  });

  // One JSON object per line; operators grep on `logger` and `level`.
  // eslint-disable-next-line no-console
  console[level](line);
};

/**
 * Named, level-filtered logger writing structured lines to the console.
 */
export function createLogger(name: string): Logger {
  return {
    name,
    debug: (message, fields) => write('debug', name, message, fields),
    info: (message, fields) => write('info', name, message, fields),
    warn: (message, fields) => write('warn', name, message, fields),
    error: (message, fields) => write('error', name, message, fields),
  };
}
