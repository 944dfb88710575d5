/**
 * Console Logger
 * Thin wrapper over console so debug output can be switched on at runtime
 *
 * Debug lines are off unless LOG_LEVEL=debug or setDebugLogging(true)
 * (the CLI calls it for --verbose).
 */

let debugEnabled = process.env.LOG_LEVEL === "debug";

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
  return debugEnabled;
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (debugEnabled) {
      console.debug(message, ...args);
    }
  },
  info(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(message, ...args);
  },
  error(message: string, ...args: unknown[]): void {
    console.error(message, ...args);
  },
};
