export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown> | undefined;

export type Logger = {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

const serializeValue = (val: unknown) => {
  if (val instanceof Error) {
    return { name: val.name, message: val.message, stack: val.stack };
  }
  return val;
};

const safeStringify = (value: unknown) => {
  try {
    return JSON.stringify(value, (_key, val: unknown) => serializeValue(val));
  } catch (_err) {
    return undefined;
  }
};

function emit(level: LogLevel, message: string, meta: LogMeta, tag: string | null) {
  if (levelOrder[level] < levelOrder[threshold]) return;

  const payload = {
    level,
    message,
    tag,
    meta: meta ?? undefined,
    timestamp: new Date().toISOString(),
  };

  const line = safeStringify(payload) ?? message;
  console[level](line);
}

export function getLogger(defaultTag?: string | null): Logger {
  const tag = defaultTag ?? null;
  return {
    debug: (message, meta) => emit('debug', message, meta, tag),
    info: (message, meta) => emit('info', message, meta, tag),
    warn: (message, meta) => emit('warn', message, meta, tag),
    error: (message, meta) => emit('error', message, meta, tag),
  };
}

export const logger = getLogger();
