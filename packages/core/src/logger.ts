import { pino, type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  name: "draftloom",
  level: process.env.LOG_LEVEL ?? "info",
  transport:
    process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test"
      ? { target: "pino/file", options: { destination: 1 } }
      : undefined,
});

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
