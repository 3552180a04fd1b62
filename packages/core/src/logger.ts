/**
 * Console logging helpers.
 * Scoped loggers prefix lines with "[scope]"; installTimestampLogging adds
 * ISO 8601 timestamps to every console line of the process.
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function debugEnabled(): boolean {
  return process.env["CS_DEBUG"] === "1";
}

/**
 * Create a logger whose lines are prefixed with the given scope.
 * Debug lines are only written when CS_DEBUG=1.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...args) {
      if (debugEnabled()) {
        console.log(prefix, message, ...args);
      }
    },
    info(message, ...args) {
      console.log(prefix, message, ...args);
    },
    warn(message, ...args) {
      console.warn(prefix, message, ...args);
    },
    error(message, ...args) {
      console.error(prefix, message, ...args);
    },
  };
}

let timestampsInstalled = false;

/**
 * Install timestamp logging by overriding console methods.
 * Safe to call more than once; only the first call patches console.
 */
export function installTimestampLogging(): void {
  if (timestampsInstalled) {
    return;
  }
  timestampsInstalled = true;

  const originalLog = console.log;
  const originalError = console.error;
  const originalWarn = console.warn;

  console.log = (...args: unknown[]) => {
    originalLog(`[${new Date().toISOString()}]`, ...args);
  };

  console.error = (...args: unknown[]) => {
    originalError(`[${new Date().toISOString()}]`, ...args);
  };

  console.warn = (...args: unknown[]) => {
    originalWarn(`[${new Date().toISOString()}]`, ...args);
  };
}
