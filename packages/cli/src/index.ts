/**
 * @breadlog/cli
 *
 * Configuration, lock-file cache, source discovery and the `breadlog`
 * command line around @breadlog/core.
 */

export { run, ExitCode } from "./run.js";
export type { ExitCodeType, RunOptions } from "./run.js";
export { loadConfig, parseConfig, ConfigFileSchema } from "./config.js";
export type { BreadlogConfig, ConfigFile } from "./config.js";
export { LockFileCache, LOCK_FILE_NAME } from "./cache.js";
export { findSourceFiles } from "./finder.js";
export { adaptLogger, createLogger, createPinoLogger, resolveLogLevel, LOG_LEVEL_ENV } from "./logger.js";
export type { LogLevel } from "./logger.js";
