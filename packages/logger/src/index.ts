export type { LevelWithSilent, Logger } from "pino";
export { createLogger, type CreateLoggerOptions } from "./logger";
export { createHttpLogger, type CreateHttpLoggerOptions } from "./http";
export { parseLogLevel, prettyByDefault } from "./levels";
