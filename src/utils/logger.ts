export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_EMOJI: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️',
  warn: '⚠️',
  error: '❌',
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function ts(): string {
  return new Date().toISOString().slice(11, 19); // HH:MM:SS
}

export function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta) return '';
  const entries = Object.entries(meta)
    .filter(([, v]) => v !== undefined && v !== null)
    .map(([k, v]) => `${k}=${JSON.stringify(v)}`);
  return entries.length ? ' ' + entries.join(' ') : '';
}

// stdout 은 MCP stdio 채널이므로 모든 로그는 stderr 로 보낸다
function baseLog(level: LogLevel, code: string, message: string, meta?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  console.error(`[${ts()}] ${LEVEL_EMOJI[level]} ${code} - ${message}${formatMeta(meta)}`);
}

export const logger = {
  debug: (code: string, msg: string, meta?: Record<string, unknown>) => baseLog('debug', code, msg, meta),
  info: (code: string, msg: string, meta?: Record<string, unknown>) => baseLog('info', code, msg, meta),
  warn: (code: string, msg: string, meta?: Record<string, unknown>) => baseLog('warn', code, msg, meta),
  error: (code: string, msg: string, meta?: Record<string, unknown>) => baseLog('error', code, msg, meta),
};
