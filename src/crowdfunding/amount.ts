import { LedgerError } from "./errors.js";
import type { Amount } from "./types.js";

/** Largest representable amount: 2^128 - 1 */
export const MAX_AMOUNT: Amount = (1n << 128n) - 1n;

const LAMPORTS_PER_SOL = 1_000_000_000n;
const DECIMAL_PATTERN = /^\d+$/;

export function isAmount(value: unknown): value is Amount {
  return typeof value === "bigint" && value >= 0n && value <= MAX_AMOUNT;
}

export function assertAmount(value: unknown, label: string): Amount {
  if (!isAmount(value)) {
    throw new LedgerError("InvalidArgument", `${label} must be an integer between 0 and 2^128 - 1`);
  }
  return value;
}

export function checkedAdd(a: Amount, b: Amount): Amount {
  const sum = a + b;
  if (sum > MAX_AMOUNT) {
    throw new LedgerError("Overflow", `Amount overflow: ${a} + ${b} exceeds 2^128 - 1`);
  }
  return sum;
}

export function parseAmount(text: string): Amount {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new LedgerError("InvalidArgument", `Not a decimal amount: "${text}"`);
  }
  return assertAmount(BigInt(trimmed), "Amount");
}

export function formatAmount(amount: Amount): string {
  return amount.toString(10);
}

/** Renders lamports as SOL without going through floating point. */
export function formatSol(lamports: Amount): string {
  const whole = lamports / LAMPORTS_PER_SOL;
  const fraction = (lamports % LAMPORTS_PER_SOL).toString().padStart(9, "0").replace(/0+$/, "");
  return fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
}
