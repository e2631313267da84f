import * as functions from 'firebase-functions';

type LogContext = Record<string, unknown>;

export type ScopedLogger = {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
};

// Structured entries go to Cloud Logging via functions.logger; the scope
// prefix keeps them greppable in the emulator console.
export function createLogger(scope: string): ScopedLogger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, context) => functions.logger.debug(`${prefix} ${message}`, context ?? {}),
    info: (message, context) => functions.logger.info(`${prefix} ${message}`, context ?? {}),
    warn: (message, context) => functions.logger.warn(`${prefix} ${message}`, context ?? {}),
    error: (message, context) => functions.logger.error(`${prefix} ${message}`, context ?? {})
  };
}
