import { principalFromPrivateKey } from "../src/lib/principal";

// Placeholder keys 1..4 (compressed); never used to sign anything
export const testKey = (n: number) => n.toString(16).padStart(64, "0") + "01";

export const ALICE = principalFromPrivateKey(testKey(1), "mainnet");
export const BOB = principalFromPrivateKey(testKey(2), "mainnet");
export const CAROL = principalFromPrivateKey(testKey(3), "mainnet");
export const DAVE = principalFromPrivateKey(testKey(4), "mainnet");

export const ALICE_TESTNET = principalFromPrivateKey(testKey(1), "testnet");

export const VAULT_CONTRACT = `${ALICE}.token-vault`;

/**
 * Runs `fn` and returns what it threw
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}
