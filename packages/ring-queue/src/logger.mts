import Axe from "axe";

export type QueueLogLevel = Axe.Level;
export type QueueLogMessage = string | Error;
export type QueueLogMeta = Record<string, unknown>;

/**
 * Minimal logging surface the queue writes diagnostics to.
 * Any object with these six methods works, not only the axe-backed one.
 */
export type QueueLogger = Record<
  QueueLogLevel,
  (message: QueueLogMessage, meta?: QueueLogMeta) => void
>;

export type QueueLoggerOptions = Axe.Options;

/**
 * Creates a {@link QueueLogger} backed by axe.
 *
 * Entries below `options.level` (default `info`) are dropped by axe, so the
 * queue's resize diagnostics only show up with `level: "debug"` or lower.
 */
export const createQueueLogger = (
  options: QueueLoggerOptions = {},
): QueueLogger => {
  const axeLogger = new Axe({ level: "info", ...options });

  const logMessage =
    (level: QueueLogLevel) =>
    (message: QueueLogMessage, meta?: QueueLogMeta): void => {
      void axeLogger[level](message, meta);
    };

  return {
    trace: logMessage("trace"),
    debug: logMessage("debug"),
    info: logMessage("info"),
    warn: logMessage("warn"),
    error: logMessage("error"),
    fatal: logMessage("fatal"),
  };
};

export default createQueueLogger;
