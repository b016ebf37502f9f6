/**
 * Minimal logger seam. Production code writes to the console; tests pass a
 * recorder.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export const consoleLogger: Logger = {
  info: message => console.log(message),
  warn: message => console.warn(message),
  error: (message, error) => {
    if (error === undefined) {
      console.error(message);
    } else {
      console.error(message, error);
    }
  },
};
