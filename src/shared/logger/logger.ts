import pino from "pino";
import { env, type AppEnv } from "../config/env";

export const resolveLogLevel = ({
  LOG_LEVEL,
  NODE_ENV,
}: Pick<AppEnv, "LOG_LEVEL" | "NODE_ENV">): string => {
  if (LOG_LEVEL) {
    return LOG_LEVEL;
  }
  switch (NODE_ENV) {
    case "production":
      return "info";
    case "test":
      return "silent";
    default:
      return "debug";
  }
};

export const logger = pino({
  name: "huntline",
  level: resolveLogLevel(env),
});

export type { Logger } from "pino";
