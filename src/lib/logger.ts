import pino from "pino";
import pretty from "pino-pretty";

const isDev = process.env.NODE_ENV === "development";

// Human-readable output for local runs only
const stream = isDev
  ? pretty({
      colorize: true,
      ignore: "pid,hostname",
      translateTime: "HH:MM:ss",
    })
  : undefined;

/**
 * Root pino logger for the thumbnail cache.
 *
 * Writes JSON lines to stdout, or pretty lines when NODE_ENV=development.
 * LOG_LEVEL overrides the level; the test config sets it to "silent".
 * Library code logs through the module children below, which tag every
 * line with `module`.
 */
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || (isDev ? "debug" : "info"),
  },
  stream
);

/** Child logger tagged with a module name, e.g. createLogger("store"). */
export function createLogger(module: string) {
  return logger.child({ module });
}

export const thumbnailLog = createLogger("thumbnails");
export const cacheLog = createLogger("cache");
