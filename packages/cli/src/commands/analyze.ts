/**
 * @lpvault/cli — `analyze` command.
 *
 * Load every committed snapshot, compute analytics and write the HTML
 * report into the partition of the run's date.
 */

import { compute } from "@lpvault/analytics";
import { render } from "@lpvault/report";
import { HistoryLoader } from "@lpvault/snapshot-store";
import type { ArtifactSink, SnapshotStore } from "@lpvault/snapshot-store";
import { toCalendarDate } from "@lpvault/types";
import type { CalendarDate } from "@lpvault/types";
import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";

export interface AnalyzeDeps {
  readonly config: AppConfig;
  readonly store: SnapshotStore & ArtifactSink;
  readonly logger: Logger;
  readonly clock?: () => Date;
}

export interface AnalyzeOptions {
  readonly date?: CalendarDate;
}

export interface AnalyzeResult {
  readonly date: CalendarDate;
  readonly path: string;
  readonly records: number;
  readonly skipped: number;
  readonly insufficientData: boolean;
}

export function analyze(deps: AnalyzeDeps, options: AnalyzeOptions = {}): AnalyzeResult {
  const { config, store, logger } = deps;
  const generatedAt = (deps.clock ?? (() => new Date()))();
  const date = options.date ?? toCalendarDate(generatedAt);

  const loader = new HistoryLoader(store, {
    onSkip: (skipped) => logger.warn(skipped, "Skipping unreadable partition"),
  });
  const { history, skipped } = loader.load();

  const records = compute(history, { basis: config.VALUE_BASIS, window: config.ROLLING_WINDOW });
  const artifact = render(records, {
    date,
    vaultName: config.VAULT_NAME,
    sourceUrl: config.VAULT_URL,
    unit: config.UNIT_LABEL,
    basis: config.VALUE_BASIS,
    generatedAt,
    skipped,
  });

  if (artifact.insufficientData) {
    logger.warn({ records: records.length }, "Not enough history for charts");
  }

  const path = store.writeArtifact(artifact.date, artifact.fileName, artifact.html);
  logger.info({ date, path, records: records.length, skipped: skipped.length }, "Report written");

  return {
    date,
    path,
    records: records.length,
    skipped: skipped.length,
    insufficientData: artifact.insufficientData,
  };
}
