import type { LedgerConfig } from "./config.js";
import { systemClock } from "./crowdfunding/clock.js";
import { Ledger } from "./crowdfunding/ledger.js";
import { FanOutNotificationSink, LoggingNotificationSink } from "./crowdfunding/notifications.js";
import type { NotificationSink } from "./crowdfunding/notifications.js";
import type { Clock, ValueTransferRail } from "./crowdfunding/types.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export interface LedgerDependencies {
  rail: ValueTransferRail;
  clock?: Clock;
  logger?: Logger;
  /** Observers notified in addition to the log */
  sinks?: NotificationSink[];
}

/**
 * Wires a ledger from configuration: authorization policy and transfer
 * timeout from the config, events always written to the log.
 */
export function buildLedger(config: LedgerConfig, deps: LedgerDependencies): Ledger {
  const logger = deps.logger ?? createLogger({ level: config.logLevel });
  const sinks: NotificationSink[] = [new LoggingNotificationSink(logger), ...(deps.sinks ?? [])];

  return new Ledger({
    clock: deps.clock ?? systemClock,
    rail: deps.rail,
    authorization: config.authorization,
    notifications: new FanOutNotificationSink(sinks, logger),
    logger,
    transferTimeoutMs: config.transferTimeoutMs
  });
}
