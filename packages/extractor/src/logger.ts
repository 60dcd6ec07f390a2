/**
 * Logger factory.
 *
 * Development: colorized pino-pretty output on stderr.
 * Production (or when stderr is not a TTY): structured JSON with redaction.
 * stdout is left for the CLI summary table.
 */

import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger } from "pino";

/** Paths masked in every log line */
export const REDACT_PATHS = [
  "token",
  "password",
  "bearerToken",
  "basicAuth.password",
  "headers.authorization",
  "headers.Authorization",
  "*.token",
  "*.password",
];

export interface CreateLoggerOptions {
  level?: LevelWithSilent;
  /** Force pretty (true) or JSON (false) output; defaults from the environment */
  pretty?: boolean;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? "info";
  const pretty =
    options?.pretty ?? (process.env.NODE_ENV !== "production" && process.stderr.isTTY === true);

  if (pretty) {
    return pino({
      level,
      redact: REDACT_PATHS,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    });
  }

  return pino({ level, redact: REDACT_PATHS }, pino.destination(2));
}

/** Logger that drops everything (library default, tests) */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
