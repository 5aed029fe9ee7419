/**
 * @lpvault/cli — Command dispatch.
 *
 * `run` never throws: every failure is logged, summarised in one line on
 * stderr and turned into an exit code.
 */

import chalk from "chalk";
import { playwrightDriver } from "@lpvault/collector";
import type { BrowserDriver } from "@lpvault/collector";
import { FileSnapshotStore } from "@lpvault/snapshot-store";
import type { ArtifactSink, SnapshotStore } from "@lpvault/snapshot-store";
import { parseArgs } from "./args.js";
import { analyze } from "./commands/analyze.js";
import { collect } from "./commands/collect.js";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { describeFailure } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export interface RunEnvironment {
  readonly env?: Record<string, string | undefined>;
  readonly createDriver?: (config: AppConfig) => BrowserDriver;
  readonly createStore?: (config: AppConfig) => SnapshotStore & ArtifactSink;
  readonly createLogger?: (config: AppConfig) => Logger;
  readonly clock?: () => Date;
  readonly sleepFn?: (ms: number) => Promise<void>;
  /** One-line status output. Default: process.stderr */
  readonly write?: (line: string) => void;
}

/**
 * Run one command and resolve to its exit code.
 */
export async function run(argv: readonly string[], environment: RunEnvironment = {}): Promise<number> {
  const write = environment.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  let logger: Logger | undefined;

  try {
    const commandLine = parseArgs(argv);
    const config = loadConfig(environment.env);
    logger = (environment.createLogger ?? createLogger)(config);
    const store = environment.createStore?.(config) ?? new FileSnapshotStore(config.HISTORY_ROOT);
    const clock = environment.clock ?? (() => new Date());

    if (commandLine.command === "collect") {
      const driver = environment.createDriver?.(config) ?? playwrightDriver({
        headless: config.BROWSER_HEADLESS,
        ...(config.BROWSER_EXECUTABLE_PATH !== undefined ? { executablePath: config.BROWSER_EXECUTABLE_PATH } : {}),
      });
      const result = await collect(
        { config, store, driver, logger, clock, ...(environment.sleepFn !== undefined ? { sleepFn: environment.sleepFn } : {}) },
        { ...(commandLine.date !== undefined ? { date: commandLine.date } : {}), backfill: commandLine.backfill },
      );
      const extra = result.backfilled.length > 0 ? ` (+${result.backfilled.length} backfilled)` : "";
      write(chalk.green(`✓ Snapshot for ${result.stored.date} committed${extra}`));
    } else {
      const result = analyze(
        { config, store, logger, clock },
        commandLine.date !== undefined ? { date: commandLine.date } : {},
      );
      const skipped = result.skipped > 0 ? chalk.yellow(` (${result.skipped} skipped)`) : "";
      write(chalk.green(`✓ Report for ${result.date} written to ${result.path}`) + skipped);
    }
    return 0;
  } catch (err: unknown) {
    const failure = describeFailure(err);
    logger?.error({ err, stage: failure.stage, code: failure.code }, failure.message);
    write(chalk.red(`✗ ${failure.stage} failed${failure.code !== undefined ? ` [${failure.code}]` : ""}: ${failure.message}`));
    return failure.exitCode;
  }
}
