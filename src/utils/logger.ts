export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, string | number | boolean | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function formatContext(context?: LogContext): string {
  if (!context) return '';
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' && /\s/.test(value) ? JSON.stringify(value) : String(value)}`);
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export function createConsoleLogger(level: LogLevel = 'info', prefix = 'hires-relay'): Logger {
  const threshold = LEVEL_RANK[level];
  const tag = `[${prefix}]`;

  const emit = (lvl: LogLevel, message: string, context?: LogContext) => {
    if (LEVEL_RANK[lvl] < threshold) return;
    const line = `${tag} ${lvl === 'info' ? '' : `${lvl.toUpperCase()} `}${message}${formatContext(context)}`;
    if (lvl === 'warn' || lvl === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
