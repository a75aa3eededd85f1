import pino from "pino";
import { env } from "./config";

export const logger = pino({
  name: "structured-script",
  level: env.LOG_LEVEL,
});

export type Logger = typeof logger;
