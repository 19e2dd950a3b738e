import pino from "pino";
import { LogData, Logger } from "./types";

type LogArgs<T> = [LogData<T>] | [Partial<LogData<T>>, string] | [string];

export type LogFormat = "json" | "pretty";

export interface LoggerOptions {
  level: string;
  format: LogFormat;
}

const SERVICE_NAME = "hermes-relay";
const isTest = process.env.NODE_ENV === "test";

const buildPinoLogger = ({ level, format }: LoggerOptions): pino.Logger => {
  const transport =
    format === "pretty" && !isTest
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
            messageFormat: "{type} {msg}",
            customColors: "info:blue,warn:yellow,error:red,debug:magenta",
            levelFirst: true,
          },
        }
      : undefined;

  return pino({
    level: isTest ? "silent" : level,
    base: {
      service: SERVICE_NAME,
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport,
  });
};

let pinoLogger: pino.Logger | undefined;

/**
 * Rebuilds the underlying pino instance once process flags are known.
 * Must run before the HTTP app is created so pino-http picks up the same instance.
 */
export const configureLogger = (options: LoggerOptions): void => {
  pinoLogger = buildPinoLogger(options);
};

// Built on first use; configureLogger replaces it
export const getPinoLogger = (): pino.Logger => {
  if (!pinoLogger) {
    pinoLogger = buildPinoLogger({
      level: process.env.HERMES_LOG_LEVEL ?? "info",
      format: process.env.HERMES_LOG_FORMAT === "json" ? "json" : "pretty",
    });
  }
  return pinoLogger;
};

const normalizeLogInput = <T>(args: LogArgs<T>): LogData<T> => {
  const [first, second] = args;
  if (typeof first === "string") {
    return { type: "GENERAL", message: first };
  }

  if (typeof second === "string") {
    return { ...first, type: first.type ?? "HTTP_LOG", message: second };
  }

  return { ...first, type: first.type ?? "GENERAL", message: first.message ?? "Log" };
};

const formatLogData = <T>({ message, error, type, payload, file, ...context }: LogData<T>) => ({
  ...context,
  msg: message,
  type: `[${type ?? "GENERAL"}]`,
  file: file ? `[${file}]` : undefined,
  payload,
  err: error,
});

const logWithLevel = <T>(level: "debug" | "info" | "warn" | "error", ...args: LogArgs<T>) => {
  const formatted = formatLogData(normalizeLogInput<T>(args));
  getPinoLogger()[level](formatted);
};

const AppLogger: Logger = {
  debug: <T>(...args: LogArgs<T>) => logWithLevel<T>("debug", ...args),
  info: <T>(...args: LogArgs<T>) => logWithLevel<T>("info", ...args),
  warn: <T>(...args: LogArgs<T>) => logWithLevel<T>("warn", ...args),
  error: <T>(...args: LogArgs<T>) => logWithLevel<T>("error", ...args),
};

export default (): Logger => AppLogger;
