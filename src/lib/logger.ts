import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

let rootLogger: Logger | null = null;

export const getLogger = (): Logger => {
  if (rootLogger) {
    return rootLogger;
  }

  rootLogger = pino({
    name: "cloud-gallery",
    level: process.env.LOG_LEVEL?.trim() || "info",
  });

  return rootLogger;
};

export const componentLogger = (component: string): Logger => getLogger().child({ component });
