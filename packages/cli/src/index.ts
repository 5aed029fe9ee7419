/**
 * @lpvault/cli
 *
 * `collect` and `analyze` commands, configuration and logging.
 */

export { run } from "./cli.js";
export type { RunEnvironment } from "./cli.js";
export { collect } from "./commands/collect.js";
export type { CollectDeps, CollectOptions, CollectResult } from "./commands/collect.js";
export { analyze } from "./commands/analyze.js";
export type { AnalyzeDeps, AnalyzeOptions, AnalyzeResult } from "./commands/analyze.js";
export { ConfigSchema, loadConfig, parseMetricList, loadLocatorSpecs, LocatorFileSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { parseArgs, USAGE } from "./args.js";
export type { CommandLine, CommandName } from "./args.js";
export { ConfigError, describeFailure, EXIT_CODES } from "./errors.js";
export type { ConfigErrorCode, FailureDescription, FailureStage } from "./errors.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
