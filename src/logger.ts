/**
 * Prefixed console logger.
 *
 * Debug output is shown when `DEBUG=true` or `NODE_ENV=development`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  enableDebug?: boolean;
}

export type Logger = Record<LogLevel, (...args: unknown[]) => void>;

function debugEnabledByEnv(): boolean {
  return process.env.NODE_ENV === "development" || process.env.DEBUG === "true";
}

/** Create a logger whose lines are tagged with `[prefix]`. */
export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  const { enableDebug = debugEnabledByEnv() } = options;
  const tag = `[${prefix}]`;

  return {
    debug: (...args) => {
      if (enableDebug) console.debug(tag, ...args);
    },
    info: (...args) => console.info(tag, ...args),
    warn: (...args) => console.warn(tag, ...args),
    error: (...args) => console.error(tag, ...args),
  };
}
