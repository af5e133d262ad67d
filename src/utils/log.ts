type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLevelName(value: string): value is keyof typeof LEVELS {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function resolveThreshold(raw: string | undefined): number {
  const normalized = raw?.trim().toLowerCase();
  if (normalized && isLevelName(normalized)) {
    return LEVELS[normalized];
  }
  return LEVELS.info;
}

function serializeMeta(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map(serializeMeta);
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = serializeMeta(entry);
    }
    return result;
  }
  return value;
}

export function formatLine(level: LogLevel, message: string, meta?: unknown, now: Date = new Date()): string {
  const head = `${now.toISOString()} ${level.toUpperCase().padEnd(5)} ${message}`;
  if (meta === undefined) return head;
  return `${head} ${JSON.stringify(serializeMeta(meta))}`;
}

function emit(level: LogLevel, message: string, meta?: unknown) {
  if (LEVELS[level] < resolveThreshold(process.env.LOG_LEVEL)) return;
  const line = formatLine(level, message, meta);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const log = {
  debug: (message: string, meta?: unknown) => emit('debug', message, meta),
  info: (message: string, meta?: unknown) => emit('info', message, meta),
  warn: (message: string, meta?: unknown) => emit('warn', message, meta),
  error: (message: string, meta?: unknown) => emit('error', message, meta)
};
