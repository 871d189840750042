import pino, { type Logger, type LoggerOptions } from 'pino';

/** Library code takes a Logger; this is the default one it falls back to. */
export function createLogger(debug = false, options: LoggerOptions = {}): Logger {
  return pino({ level: debug ? 'debug' : 'warn', ...options });
}
