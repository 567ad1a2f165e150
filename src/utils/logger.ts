import { pino } from "pino";
import type { LevelWithSilent, Logger } from "pino";

const LEVELS: ReadonlyArray<LevelWithSilent> = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function resolveLevel(raw: string | undefined): LevelWithSilent {
  const value = raw?.trim().toLowerCase();
  return LEVELS.find((l) => l === value) ?? "info";
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  return pino({
    level: resolveLevel(process.env.LOG_LEVEL),
    base: {
      service: "tfidf-weights",
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
