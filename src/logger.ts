import pino, { type Logger } from "pino";

// ── Structured Logger — pino ─────────────────────────────
// JSON output in production. LOG_PRETTY=true (or any non-production
// NODE_ENV) switches to pino-pretty. Tests run silent unless LOG_LEVEL is set.

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.VITEST === "true" || process.env.NODE_ENV === "test";
const isPretty =
  !isTest && (process.env.LOG_PRETTY === "true" || !isProduction);

export const log: Logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? "silent" : "info"),
  ...(isPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});

/** Child logger tagged with the component name. */
export function moduleLogger(module: string): Logger {
  return log.child({ module });
}
