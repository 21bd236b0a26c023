import { describe, it, expect } from "vitest";
import { Ledger } from "../src/core/ledger";
import { EventLog } from "../src/core/events";
import { parseSnapshot } from "../src/lib/snapshot";
import { ERROR_CODES } from "../src/constants";
import type { LedgerSnapshot } from "../src/types";
import { ALICE, ALICE_TESTNET, BOB, CAROL, catchError } from "./fixtures";

const validSnapshot = (): LedgerSnapshot => ({
  version: 1,
  metadata: { name: "Test Token", symbol: "TEST", decimals: 2 },
  totalSupply: "100",
  balances: { [ALICE]: "70", [BOB]: "30" },
  allowances: [{ owner: ALICE, spender: CAROL, value: "15" }],
});

describe("Snapshots", () => {
  it("should capture balances, allowances and metadata as strings", () => {
    const ledger = Ledger.deploy(ALICE, 100n, {
      metadata: { name: "Test Token", symbol: "TEST", decimals: 2 },
    });
    ledger.transfer(ALICE, BOB, 30n);
    ledger.approve(ALICE, CAROL, 15n);

    expect(ledger.snapshot()).toEqual(validSnapshot());
  });

  it("should restore a ledger that keeps working", () => {
    const events = new EventLog();
    const ledger = Ledger.restore(validSnapshot(), { sink: events });

    expect(ledger.totalSupply()).toBe(100n);
    expect(ledger.balanceOf(ALICE)).toBe(70n);
    expect(ledger.allowance(ALICE, CAROL)).toBe(15n);
    expect(ledger.symbol()).toBe("TEST");
    expect(events.size).toBe(0);

    expect(ledger.transferFrom(CAROL, ALICE, CAROL, 15n)).not.toBeInstanceOf(Error);
    expect(ledger.balanceOf(CAROL)).toBe(15n);
    expect(ledger.allowance(ALICE, CAROL)).toBe(0n);
    expect(events.size).toBe(1);
  });

  it("should reject balances that do not add up to the supply", () => {
    const snapshot = { ...validSnapshot(), totalSupply: "101" };

    expect(catchError(() => parseSnapshot(snapshot))).toMatchObject({
      code: ERROR_CODES.INVALID_SNAPSHOT,
      message: "Invalid snapshot: balances sum to 100, total supply is 101",
    });
  });

  it("should reject malformed amounts and principals", () => {
    const negative = { ...validSnapshot(), balances: { [ALICE]: "-1", [BOB]: "101" } };
    const badPrincipal = { ...validSnapshot(), balances: { SP123: "70", [BOB]: "30" } };
    const oversized = { ...validSnapshot(), totalSupply: (2n ** 128n).toString() };

    for (const input of [negative, badPrincipal, oversized]) {
      expect(catchError(() => Ledger.restore(input))).toMatchObject({
        code: ERROR_CODES.INVALID_SNAPSHOT,
      });
    }
  });

  it("should reject other shapes and versions", () => {
    for (const input of [null, "ledger", { ...validSnapshot(), version: 2 }]) {
      expect(catchError(() => parseSnapshot(input))).toMatchObject({
        code: ERROR_CODES.INVALID_SNAPSHOT,
      });
    }
  });

  it("should reject duplicate allowance entries", () => {
    const snapshot = validSnapshot();
    snapshot.allowances.push({ owner: ALICE, spender: CAROL, value: "1" });

    expect(catchError(() => parseSnapshot(snapshot))).toMatchObject({
      code: ERROR_CODES.INVALID_SNAPSHOT,
      details: { owner: ALICE, spender: CAROL },
    });
  });

  it("should apply the network constraint to restored principals", () => {
    const snapshot = { ...validSnapshot(), balances: { [ALICE_TESTNET]: "70", [BOB]: "30" } };

    expect(parseSnapshot(snapshot).totalSupply).toBe("100");
    expect(catchError(() => parseSnapshot(snapshot, "mainnet"))).toMatchObject({
      code: ERROR_CODES.INVALID_SNAPSHOT,
    });
  });
});
