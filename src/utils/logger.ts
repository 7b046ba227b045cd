import Logger, { type ILogger, type ILogLevel } from 'js-logger';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'off';

const LEVELS: Record<LogLevelName, ILogLevel> = {
  debug: Logger.DEBUG,
  info: Logger.INFO,
  warn: Logger.WARN,
  error: Logger.ERROR,
  off: Logger.OFF,
};

let configured = false;

function ensureConfigured() {
  if (configured) return;
  configured = true;

  Logger.useDefaults({
    defaultLevel: Logger.WARN,
    formatter: (messages, context) => {
      if (context.name) {
        messages.unshift(`[${context.name}]`);
      }
    },
  });
}

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function setLogLevel(level: LogLevelName) {
  ensureConfigured();
  Logger.setLevel(LEVELS[level]);
}

/**
 * Reads LOG_LEVEL from the given environment. Unknown values fall back to warn.
 */
export function resolveLogLevel(value: string | undefined): LogLevelName {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevelName(normalized) ? normalized : 'warn';
}

export function createLogger(name: string): ILogger {
  ensureConfigured();
  return Logger.get(name);
}
