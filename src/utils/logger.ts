export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

const isLogLevel = (value: string): value is LogLevel => Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

const threshold = (): number => {
  const configured = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
  return isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.INFO;
};

export const log = (level: LogLevel, msg: string, meta?: unknown): void => {
  if (LEVEL_ORDER[level] < threshold()) return;
  const stamp = new Date().toISOString();
  const write = level === 'ERROR' ? console.error : console.log;
  if (meta !== undefined) {
    write(`[${stamp}] [${level}] ${msg}`, meta);
  } else {
    write(`[${stamp}] [${level}] ${msg}`);
  }
};
