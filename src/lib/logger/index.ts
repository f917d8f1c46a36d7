export { createLogger, getDefaultLogger, type Logger, type LoggerConfig } from "./logger";

export type { LogLevel } from "./schema";
