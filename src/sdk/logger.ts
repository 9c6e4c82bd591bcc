/**
 * pino-backed logging for the signaling client.
 *
 * Level defaults to `SIGNALING_LOG_LEVEL`, then "info". Components log
 * through named children so every line carries `component`.
 */

import { pino, destination, type Logger, type LevelWithSilent } from "pino";

export type { Logger } from "pino";

let root: Logger | null = null;

/** The process-wide root logger. Writes JSON lines to stderr. */
export function rootLogger(): Logger {
  root ??= pino(
    { name: "room-signaling", level: parseLevel(process.env.SIGNALING_LOG_LEVEL) ?? "info" },
    destination(2),
  );
  return root;
}

/** Child logger tagged with a component name. */
export function createLogger(component: string, parent: Logger = rootLogger()): Logger {
  return parent.child({ component });
}

/** A logger that discards everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

const LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LevelWithSilent[];

/** Parse a user-supplied level name, returning null when it is not one pino knows. */
export function parseLevel(value: string | undefined): LevelWithSilent | null {
  const wanted = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === wanted) ?? null;
}
