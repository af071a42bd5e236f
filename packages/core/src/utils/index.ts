/**
 * Utils Module
 */

export { logger, initLogger, getLogger, LogLevel } from "./logger.js";
export type { Logger, LoggerConfig } from "./logger.js";
