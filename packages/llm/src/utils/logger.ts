export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

function serializeField(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function formatLog(level: LogLevel, scope: string, message: string, fields: LogFields): string {
  const serialized: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    serialized[key] = serializeField(value);
  }
  return JSON.stringify({
    level: level.toUpperCase(),
    scope,
    message,
    ...serialized,
    ts: new Date().toISOString(),
  });
}

function debugEnabled(): boolean {
  return (process.env['LOG_LEVEL'] ?? '').toLowerCase() === 'debug';
}

/**
 * Structured JSON-line logger. Every record carries the scope and any fields
 * bound through `child()`.
 */
export function createLogger(scope: string, bound: LogFields = {}): Logger {
  return {
    debug(message, fields = {}) {
      if (debugEnabled()) {
        console.debug(formatLog('debug', scope, message, { ...bound, ...fields }));
      }
    },
    info(message, fields = {}) {
      console.log(formatLog('info', scope, message, { ...bound, ...fields }));
    },
    warn(message, fields = {}) {
      console.warn(formatLog('warn', scope, message, { ...bound, ...fields }));
    },
    error(message, fields = {}) {
      console.error(formatLog('error', scope, message, { ...bound, ...fields }));
    },
    child(fields) {
      return createLogger(scope, { ...bound, ...fields });
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
