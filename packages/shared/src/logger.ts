import pino, { type Logger } from "pino";

export type { Logger };

// Unknown levels fall back to "info" so that loadEnv can report them instead of pino throwing.
export function resolveLogLevel(level: string | undefined): string {
  if (level === undefined) {
    return "info";
  }
  return level === "silent" || level in pino.levels.values ? level : "info";
}

export function createLogger(level: string | undefined = process.env.LOG_LEVEL): Logger {
  return pino({
    name: "crm-relay",
    level: resolveLogLevel(level)
  });
}

export const logger = createLogger();
