import pino, { Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  /** Enables `debug` level output. */
  debug?: boolean;
}

/** Creates the process logger. Output goes to stderr so stdout stays free for callers. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: "epub-eink",
      level: options.debug ? "debug" : "info",
    },
    pino.destination(2),
  );
}

/** A logger that discards everything; used by tests and quiet library callers. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
