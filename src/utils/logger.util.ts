export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 99 };

function is_level(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, v);
}

export function parse_level(raw: string | undefined): LogLevel | null {
  if (!raw) return null;
  const v = raw.trim().toLowerCase();
  return is_level(v) ? v : null;
}

// 测试进程默认静音；ACE_LOG_LEVEL 可覆盖
let current: LogLevel = parse_level(process.env.ACE_LOG_LEVEL) ?? (process.env.VITEST ? 'silent' : 'info');

export function set_log_level(level: LogLevel): void {
  current = level;
}

export function get_log_level(): LogLevel {
  return current;
}

function serialize(v: unknown): string {
  try {
    return typeof v === 'string' ? v : JSON.stringify(v);
  } catch {
    return String(v);
  }
}

export function log(level: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[current]) return;
  const base = `[ace] ${new Date().toISOString()} ${level.toUpperCase()} ${message}`;
  const line = meta && Object.keys(meta).length ? `${base} ${serialize(meta)}` : base;

  // eslint-disable-next-line no-console
  if (level === 'error') console.error(line);
  // eslint-disable-next-line no-console
  else if (level === 'warn') console.warn(line);
  // eslint-disable-next-line no-console
  else console.log(line);
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>) {
    log('debug', message, meta);
  },
  info(message: string, meta?: Record<string, unknown>) {
    log('info', message, meta);
  },
  warn(message: string, meta?: Record<string, unknown>) {
    log('warn', message, meta);
  },
  error(message: string, meta?: Record<string, unknown>) {
    log('error', message, meta);
  },
};
