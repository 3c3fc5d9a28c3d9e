import pino, { Logger } from "pino";

export type { Logger };

const rootLogger = pino({
  name: "stepwright",
  level: process.env.LOG_LEVEL ?? "info",
});

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}
