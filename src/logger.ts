import * as util from 'util';

/**
 * Sink for diagnostic output. Compatible with `console`.
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export interface LoggingOptions {
  /** Enable debug output (default: `DFA_DEBUG` is set) */
  debug?: boolean;
  /** Custom logger (default: console) */
  logger?: Logger;
}

// objects are expanded fully and coloured, strings pass through
const inspectAll = (args: unknown[]): unknown[] =>
  args.map((arg) => typeof arg === 'string' ? arg : util.inspect(arg, false, null, true));

export const consoleLogger: Logger = {
  debug: (...args) => console.debug(...inspectAll(args)),
  log: (...args) => console.log(...inspectAll(args)),
  warn: (...args) => console.warn(...inspectAll(args)),
  error: (...args) => console.error(...inspectAll(args)),
};

// "", "0" and "false" leave debugging off
export function debugEnabled (options: LoggingOptions = {}): boolean {
  const flag = (process.env.DFA_DEBUG ?? '').trim().toLowerCase();
  return options.debug ?? !['', '0', 'false'].includes(flag);
}

/**
 * Returns a `debug(...)` function bound to the options, a no-op unless
 * debugging is enabled.
 */
export function createDebug (scope: string, options: LoggingOptions = {}): (...args: unknown[]) => void {
  if (!debugEnabled(options)) return () => {};
  const logger = options.logger ?? consoleLogger;
  return (...args) => logger.debug(`[${scope}]`, ...args);
}
