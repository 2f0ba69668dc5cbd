import pino, { type Logger } from "pino";
import pretty from "pino-pretty";
import { env, isProduction } from "./config.js";

export type { Logger };

export const logger: Logger = isProduction
  ? pino({ level: env.LOG_LEVEL })
  : pino({ level: env.LOG_LEVEL }, pretty({ colorize: true, translateTime: "SYS:standard" }));
