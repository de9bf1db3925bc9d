/**
 * Lightweight structured logger shared by the server and the workers.
 * Format: [Component] message {context}
 *
 * One process-wide threshold; the run configuration's verbosity is applied
 * with setLogLevel once it is known.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, ctx?: LogContext): void;
  info(message: string, ctx?: LogContext): void;
  warn(message: string, ctx?: LogContext): void;
  error(message: string, ctx?: LogContext): void;
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

let threshold = LOG_LEVELS.indexOf('info');

export function setLogLevel(level: LogLevel): void {
  threshold = LOG_LEVELS.indexOf(level);
}

export function formatLogLine(component: string, message: string, ctx?: LogContext): string {
  const context = ctx && Object.keys(ctx).length > 0 ? ` ${JSON.stringify(ctx)}` : '';
  return `[${component}] ${message}${context}`;
}

export function createLogger(component: string): Logger {
  const at =
    (level: LogLevel) =>
    (message: string, ctx?: LogContext): void => {
      if (LOG_LEVELS.indexOf(level) < threshold) return;
      WRITERS[level](formatLogLine(component, message, ctx));
    };
  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}
