export type LedgerErrorCode =
  | "InvalidIndex"
  | "NotAuthorized"
  | "CampaignClosed"
  | "CampaignStillOpen"
  | "CampaignAlreadySettled"
  | "NothingToSettle"
  | "NoBenefactor"
  | "Overflow"
  | "ReentrantCall"
  | "TransferFailed"
  | "InvalidArgument";

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}

export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  if (!(err instanceof LedgerError)) return false;
  return code === undefined || err.code === code;
}
