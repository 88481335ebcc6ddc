import pino, { type LoggerOptions } from "pino";
import { env } from "./config/env";

const options: LoggerOptions = {
  level: env.LOG_LEVEL,
  base: {
    app: env.APP_NAME,
    env: env.NODE_ENV,
  },
  messageKey: "message",
  redact: ['req.headers["x-admin-key"]', "req.headers.authorization"],
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

export const logger = pino(options);
