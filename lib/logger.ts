/**
 * Server logger contract
 *
 * Every Tramway component takes a ServerLogger at construction. Any object with
 * these methods works (pino, winston and console all fit with a thin wrapper).
 *
 * @module logger
 */

export interface ServerLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;

  /**
   * Starts a named timer and returns the function that stops it
   */
  profile(label: string): () => void;
}

/**
 * Creates a console-backed logger
 *
 * Provides basic console logging for development purposes.
 * In production, you should provide your own logger instance.
 *
 * @returns Default ServerLogger implementation
 */
export function createDefaultLogger(): ServerLogger {
  return {
    info: (message: string, ...args: unknown[]) => {
      console.log(`[INFO]: ${message}`, ...args);
    },
    error: (message: string, ...args: unknown[]) => {
      console.error(`[ERROR]: ${message}`, ...args);
    },
    warn: (message: string, ...args: unknown[]) => {
      console.warn(`[WARN]: ${message}`, ...args);
    },
    profile: (label: string) => {
      console.time(label);
      return () => console.timeEnd(label);
    },
  };
}

/**
 * Logger that drops everything; handy for embedding and tests
 */
export function createSilentLogger(): ServerLogger {
  return {
    info: () => {},
    error: () => {},
    warn: () => {},
    profile: () => () => {},
  };
}
