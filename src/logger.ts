import pino from "pino";

export interface LoggerOptions {
  component: string;
  site?: string;
}

const env = process.env.NODE_ENV;
const pretty = env !== "production" && env !== "test" && process.stdout.isTTY === true;

const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (env === "test" ? "silent" : "info"),
  transport: pretty
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.site && { site: options.site }),
  });
}
