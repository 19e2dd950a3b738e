import makeLogger from "./logger";

export { default as makeLogger, configureLogger, getPinoLogger } from "./logger";
export type { LogFormat, LoggerOptions } from "./logger";
export type { LogData, Logger, LogMethod } from "./types";
export const logger = makeLogger();
