// Tendon Stiffness Analyzer - Logging
//
// Components take a Logger through their options so tests can pass vi.fn()
// spies; the default writes to the console with a level and component prefix.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(component?: string): Logger {
  const tag = component ? ` [${component}]` : "";
  return {
    info: (msg, ...args) => console.log(`[INFO]${tag} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN]${tag} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR]${tag} ${msg}`, ...args),
  };
}

/** Discards everything. Used where a caller opts out of logging. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
