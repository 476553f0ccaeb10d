/**
 * Structured logger used by the engine.
 *
 * Implementations can route to the console, a file or an external service.
 * The engine only ever calls these four methods.
 */
export type EngineLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

/**
 * Console logger with level prefixes.
 */
export const consoleLogger: EngineLogger = {
  debug(message, data) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message, data) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message, data) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message, data) {
    console.error(`[ERROR] ${message}`, data ?? '');
  }
};

/**
 * Default logger: discards everything.
 */
export const silentLogger: EngineLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {}
};

export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Creates a logger that stores entries for inspection (tests, tooling).
 */
export function createCapturingLogger(): EngineLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log =
    (level: LogEntry['level']) =>
    (message: string, data?: Record<string, unknown>) => {
      entries.push({
        level,
        message,
        data,
        timestamp: new Date().toISOString()
      });
    };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error')
  };
}
