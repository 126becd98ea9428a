import pino from "pino";

/**
 * Shared logger. Writes to stderr so that CLI output on stdout stays parseable.
 */
export const logger = pino(
  {
    name: "clearview",
    level: process.env.LOG_LEVEL || "info",
  },
  pino.destination({ dest: 2, sync: true })
);
