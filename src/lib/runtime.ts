export interface ExplorerDebugLogger {
  db: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const silentLogger: ExplorerDebugLogger = {
  db: () => undefined,
  error: () => undefined,
};

let debugLogger: ExplorerDebugLogger = silentLogger;

export const debug = {
  db: (...args: unknown[]) => {
    debugLogger.db(...args);
  },
  error: (...args: unknown[]) => {
    debugLogger.error(...args);
  },
};

export const setDebugLogger = (logger: ExplorerDebugLogger | null): void => {
  debugLogger = logger ?? silentLogger;
};

/**
 * Normalise an unknown thrown value for the error channel.
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
