/**
 * @lpvault/cli — Command-line parsing.
 *
 *   lpvault collect [--date=YYYY-MM-DD] [--backfill]
 *   lpvault analyze [--date=YYYY-MM-DD]
 */

import { isCalendarDate } from "@lpvault/types";
import type { CalendarDate } from "@lpvault/types";
import { ConfigError } from "./errors.js";

export type CommandName = "collect" | "analyze";

export interface CommandLine {
  readonly command: CommandName;
  /** Partition date override */
  readonly date?: CalendarDate;
  /** collect only: also import the dashboard's daily table */
  readonly backfill: boolean;
}

export const USAGE = [
  "Usage:",
  "  lpvault collect [--date=YYYY-MM-DD] [--backfill]",
  "  lpvault analyze [--date=YYYY-MM-DD]",
].join("\n");

const FLAGS: Readonly<Record<CommandName, readonly string[]>> = {
  collect: ["date", "backfill"],
  analyze: ["date"],
};

/**
 * @throws {ConfigError} INVALID_ARGUMENTS
 */
export function parseArgs(argv: readonly string[]): CommandLine {
  const [command, ...rest] = argv;
  if (command !== "collect" && command !== "analyze") {
    throw new ConfigError(
      "INVALID_ARGUMENTS",
      command === undefined ? `Missing command.\n${USAGE}` : `Unknown command "${command}".\n${USAGE}`,
    );
  }

  const flags = new Map<string, string>();
  for (const arg of rest) {
    const match = /^--([a-z-]+)(?:=(.*))?$/.exec(arg);
    const name = match?.[1];
    if (name === undefined || !FLAGS[command].includes(name)) {
      throw new ConfigError("INVALID_ARGUMENTS", `Unexpected argument "${arg}" for ${command}.\n${USAGE}`);
    }
    flags.set(name, match?.[2] ?? "true");
  }

  const date = flags.get("date");
  if (date !== undefined && !isCalendarDate(date)) {
    throw new ConfigError("INVALID_ARGUMENTS", `--date must be a real YYYY-MM-DD day, got "${date}"`);
  }

  const backfill = flags.get("backfill");
  if (backfill !== undefined && backfill !== "true" && backfill !== "false") {
    throw new ConfigError("INVALID_ARGUMENTS", `--backfill takes no value or one of true, false; got "${backfill}"`);
  }

  return {
    command,
    ...(date !== undefined ? { date } : {}),
    backfill: backfill === "true",
  };
}
