import { z } from "zod";
import { AMOUNT_LIMITS, ERROR_CODES, SNAPSHOT_VERSION } from "../constants";
import { ErrorUtils } from "../utils";
import { isValidPrincipal } from "./principal";
import type { LedgerSnapshot, NetworkName } from "../types";

const AmountSchema = z
  .string()
  .regex(/^\d+$/, "must be an unsigned integer string")
  // refinements still run after a failed regex check
  .refine((value) => !/^\d+$/.test(value) || BigInt(value) <= AMOUNT_LIMITS.MAX, "exceeds uint128");

export const MetadataSchema = z.object({
  name: z.string().min(1),
  symbol: z.string().min(1),
  decimals: z.number().int().min(0).max(255),
  tokenUri: z.string().url().optional(),
});

const buildSnapshotSchema = (network?: NetworkName) => {
  const PrincipalSchema = z
    .string()
    .refine((value) => isValidPrincipal(value, network), "invalid principal");

  return z.object({
    version: z.literal(SNAPSHOT_VERSION),
    metadata: MetadataSchema,
    totalSupply: AmountSchema,
    balances: z.record(PrincipalSchema, AmountSchema),
    allowances: z.array(
      z.object({
        owner: PrincipalSchema,
        spender: PrincipalSchema,
        value: AmountSchema,
      })
    ),
  });
};

/**
 * Validates untrusted snapshot data, including that the balances add up
 * to the total supply.
 */
export function parseSnapshot(input: unknown, network?: NetworkName): LedgerSnapshot {
  const parsed = buildSnapshotSchema(network).safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(
      (e) => `${e.path.join(".") || "snapshot"}: ${e.message}`
    );
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_SNAPSHOT,
      `Invalid snapshot: ${issues.join("; ")}`,
      { issues }
    );
  }

  const snapshot = parsed.data;
  const sum = Object.values(snapshot.balances).reduce(
    (acc, value) => acc + BigInt(value),
    0n
  );
  if (sum !== BigInt(snapshot.totalSupply)) {
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_SNAPSHOT,
      `Invalid snapshot: balances sum to ${sum}, total supply is ${snapshot.totalSupply}`,
      { sum: sum.toString(), totalSupply: snapshot.totalSupply }
    );
  }

  const seen = new Set<string>();
  for (const { owner, spender } of snapshot.allowances) {
    const key = `${owner}|${spender}`;
    if (seen.has(key)) {
      throw ErrorUtils.createError(
        ERROR_CODES.INVALID_SNAPSHOT,
        `Invalid snapshot: duplicate allowance ${owner} -> ${spender}`,
        { owner, spender }
      );
    }
    seen.add(key);
  }

  return snapshot;
}
