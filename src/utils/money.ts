import Decimal from "decimal.js";
import { InvalidAmountError } from "../errors";

export type AmountInput = string | number | Decimal;

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parse a caller-supplied amount into a Decimal, rejecting anything that is
 * not a positive number with at most `scale` fractional digits.
 */
export function parseAmount(input: AmountInput, scale: number): Decimal {
  let amount: Decimal;

  if (Decimal.isDecimal(input)) {
    amount = input;
  } else if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      throw new InvalidAmountError(`Amount must be a finite number, got ${input}`);
    }
    amount = new Decimal(input);
  } else {
    const trimmed = input.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
      throw new InvalidAmountError(`Amount must be a positive decimal, got "${input}"`);
    }
    amount = new Decimal(trimmed);
  }

  if (!amount.isFinite() || amount.isNegative() || amount.isZero()) {
    throw new InvalidAmountError("Amount must be positive");
  }
  if (amount.decimalPlaces() > scale) {
    throw new InvalidAmountError(`Amount supports at most ${scale} decimal places`);
  }

  return amount;
}

export function formatAmount(value: AmountInput, scale: number): string {
  return new Decimal(value).toFixed(scale);
}
