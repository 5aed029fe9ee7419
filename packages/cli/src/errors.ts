/**
 * @lpvault/cli — Failure classification.
 *
 * Every error that reaches the top of a command is mapped to the stage
 * that failed and a sysexits-style exit code.
 */

import { ExtractionError, RetryExhaustedError, SessionError } from "@lpvault/collector";
import { StoreError } from "@lpvault/snapshot-store";

export type ConfigErrorCode = "INVALID_CONFIG" | "INVALID_LOCATORS" | "INVALID_ARGUMENTS";

/**
 * Invalid environment, locator file or command line.
 */
export class ConfigError extends Error {
  constructor(
    public readonly code: ConfigErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export type FailureStage = "config" | "session" | "extraction" | "storage" | "unknown";

export const EXIT_CODES: Readonly<Record<FailureStage, number>> = {
  config: 64,
  extraction: 65,
  session: 69,
  storage: 74,
  unknown: 1,
};

export interface FailureDescription {
  readonly stage: FailureStage;
  readonly exitCode: number;
  readonly code: string | undefined;
  readonly message: string;
}

export function describeFailure(err: unknown): FailureDescription {
  const message = err instanceof Error ? err.message : String(err);
  const failure = (stage: FailureStage, code?: string): FailureDescription => ({
    stage,
    exitCode: EXIT_CODES[stage],
    code,
    message,
  });

  if (err instanceof ConfigError) return failure("config", err.code);
  if (err instanceof SessionError) return failure("session", err.code);
  if (err instanceof RetryExhaustedError) return failure("session", err.lastError.code);
  if (err instanceof ExtractionError) return failure("extraction", err.code);
  if (err instanceof StoreError) return failure("storage", err.code);
  return failure("unknown");
}
