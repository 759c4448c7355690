/**
 * Prefix logger used across the coordinator and the console.
 * Provides info, warn, error, and debug levels.
 */

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: unknown) => void;
  debug: (msg: string) => void;
}

/**
 * Where formatted lines end up. Defaults to the global console.
 */
export interface LogSink {
  log: (line: string) => void;
  warn: (line: string) => void;
  error: (line: string) => void;
}

/**
 * Create a logger with a consistent prefix.
 * @param prefix - The prefix to prepend to all log messages (e.g., "FLEET", "SIM", "CONSOLE")
 */
export const createLogger = (prefix: string, sink: LogSink = console): Logger => ({
  info: (msg: string) => sink.log(`[${prefix}] ${msg}`),
  warn: (msg: string) => sink.warn(`[${prefix}] ${msg}`),
  error: (msg: string, err?: unknown) => {
    const errMsg = err instanceof Error ? err.message : String(err ?? "");
    sink.error(`[${prefix}] ${msg}${err ? `: ${errMsg}` : ""}`);
  },
  debug: (msg: string) => {
    if (process.env.DEBUG) {
      sink.log(`[${prefix}:DEBUG] ${msg}`);
    }
  },
});

/**
 * A logger that drops everything. Handy as a default for embedded use.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
