import pino, { Logger } from "pino";
import { config } from "../config";

const rootLogger = pino({
  level: config.LOG_LEVEL,
  name: "marketplace",
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(config.NODE_ENV === "development" && {
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: true,
        ignore: "pid,hostname",
      },
    },
  }),
});

export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}

export default rootLogger;
