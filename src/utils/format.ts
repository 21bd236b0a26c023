import { AMOUNT_LIMITS, ERROR_CODES } from "../constants";
import { ErrorUtils } from "./index";

/**
 * Parses a base-unit amount typed by a user ("1000", "1_000_000")
 */
export function parseAmount(input: string): bigint {
  const normalized = input.trim().replace(/_/g, "");
  if (!/^\d+$/.test(normalized)) {
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_AMOUNT,
      `Invalid amount '${input}': expected an unsigned integer in base units`,
      { input }
    );
  }

  const value = BigInt(normalized);
  if (value > AMOUNT_LIMITS.MAX) {
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_AMOUNT,
      `Invalid amount '${input}': exceeds uint128`,
      { input }
    );
  }
  return value;
}

/**
 * Renders base units with the token's decimals, e.g. 1500000n @ 6 -> "1.5"
 */
export function formatAmount(value: bigint, decimals: number): string {
  if (decimals === 0) return value.toString();

  const base = 10n ** BigInt(decimals);
  const whole = value / base;
  const fraction = (value % base).toString().padStart(decimals, "0").replace(/0+$/, "");
  return fraction ? `${whole}.${fraction}` : whole.toString();
}
