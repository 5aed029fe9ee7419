/**
 * @lpvault/cli — Structured logging.
 *
 * JSON lines through pino; pretty-printed through pino-pretty in
 * development. Logs go to stderr so stdout stays free for results.
 */

import { destination as pinoDestination, pino } from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger };

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }

  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }

  return pino({ level: config.LOG_LEVEL }, pinoDestination(2));
}
