import pino from "pino";
import { env } from "./config";

export const logger = pino({
  level: env.LOG_LEVEL,
  redact: {
    paths: ["apiKey", "*.apiKey", "OPENAI_API_KEY"],
    censor: "[REDACTED]",
  },
  transport: env.LOG_PRETTY
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      }
    : undefined,
});
