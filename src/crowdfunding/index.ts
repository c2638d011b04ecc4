export { Ledger, DEFAULT_TRANSFER_TIMEOUT_MS } from "./ledger.js";
export type { LedgerOptions } from "./ledger.js";
export { LedgerError, isLedgerError } from "./errors.js";
export type { LedgerErrorCode } from "./errors.js";
export { MAX_AMOUNT, assertAmount, checkedAdd, formatAmount, formatSol, isAmount, parseAmount } from "./amount.js";
export { Authorizer, DEFAULT_CREATE_POLICY, DEFAULT_END_POLICY } from "./authorization.js";
export type { LedgerAction } from "./authorization.js";
export { NULL_IDENTITY, isValidIdentity, isValidRecipient } from "./identity.js";
export { SettlementGuard } from "./settlement-guard.js";
export { InMemoryCustody } from "./custody.js";
export type { PayoutRecord } from "./custody.js";
export {
  FanOutNotificationSink,
  LoggingNotificationSink,
  MemoryNotificationSink,
  dispatch,
  makeEvent
} from "./notifications.js";
export type {
  CampaignCreatedEvent,
  CampaignEndedEvent,
  DonationEvent,
  EventListener,
  LedgerEvent,
  NotificationSink
} from "./notifications.js";
export { loadSnapshot, parseSnapshot, restoreLedger, saveSnapshot, toSnapshot } from "./snapshot.js";
export type { LedgerSnapshot, StoredCampaign } from "./snapshot.js";
export { systemClock } from "./clock.js";
export type {
  Amount,
  AuthorizationConfig,
  AuthorizationPolicy,
  Campaign,
  CampaignState,
  Clock,
  CreateCampaignInput,
  PublicKeyLike,
  SettlementReceipt,
  TransferRequest,
  TransferResult,
  ValueTransferRail
} from "./types.js";
