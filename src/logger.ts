// Patient Dialogue Engine - Logging
// Console-backed, component-tagged logger: "[LEVEL] [Component] message".
// Every component takes a Logger so tests can pass silentLogger.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(component: string, options: { debug?: boolean } = {}): Logger {
  const tag = `[${component}]`;
  const debugEnabled = options.debug ?? process.env.LOG_LEVEL === "debug";
  return {
    debug: (msg, ...args) => {
      if (debugEnabled) console.log(`[DEBUG] ${tag} ${msg}`, ...args);
    },
    info: (msg, ...args) => console.log(`[INFO] ${tag} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] ${tag} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] ${tag} ${msg}`, ...args),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
