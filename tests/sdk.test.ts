import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { Tally } from "../src/core/sdk";
import { debugUtils } from "../src/utils/debug";
import { writeState } from "../src/lib/state";
import { ERROR_CODES } from "../src/constants";
import { ALICE, ALICE_TESTNET, BOB, CAROL, catchError } from "./fixtures";

describe("Tally SDK", () => {
  let dir: string;
  let stateFile: string;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tally-"));
    stateFile = path.join(dir, "nested", "ledger.json");
    await Tally.configure({ caller: ALICE, stateFile });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("Deployment", () => {
    it("should deploy to the configured caller", () => {
      const { ledger, events } = Tally.deploy(1000n);

      expect(ledger.balanceOf(ALICE)).toBe(1000n);
      expect(events.all()).toEqual([{ type: "transfer", from: null, to: ALICE, value: 1000n }]);
    });

    it("should let the options name the deployer", () => {
      const { ledger } = Tally.deploy(10n, { caller: BOB, metadata: { symbol: "BOB" } });

      expect(ledger.balanceOf(BOB)).toBe(10n);
      expect(ledger.balanceOf(ALICE)).toBe(0n);
      expect(ledger.symbol()).toBe("BOB");
    });

    it("should require a caller", () => {
      Tally.config = { ...Tally.config, caller: "" };

      expect(catchError(() => Tally.deploy(10n))).toMatchObject({
        code: ERROR_CODES.INVALID_CONFIG,
      });
    });

    it("should enforce the network in strict mode", async () => {
      await Tally.configure({ network: "testnet", strictNetwork: true, caller: ALICE_TESTNET });
      const { ledger } = Tally.deploy(10n);

      expect(catchError(() => ledger.transfer(ALICE_TESTNET, ALICE, 1n))).toMatchObject({
        code: ERROR_CODES.INVALID_PRINCIPAL,
      });
    });
  });

  describe("State file", () => {
    it("should save and load a ledger with its events", () => {
      const hosted = Tally.deploy(1000n);
      hosted.ledger.transfer(ALICE, BOB, 250n);
      hosted.ledger.approve(BOB, CAROL, 100n);

      expect(Tally.exists()).toBe(false);
      Tally.save(hosted);
      expect(Tally.exists()).toBe(true);

      const loaded = Tally.load();
      expect(loaded.ledger.snapshot()).toEqual(hosted.ledger.snapshot());
      expect(loaded.events.all()).toEqual(hosted.events.all());

      expect(loaded.ledger.transferFrom(CAROL, BOB, CAROL, 100n)).not.toBeInstanceOf(Error);
      expect(loaded.events.size).toBe(4);
    });

    it("should write amounts as strings", () => {
      Tally.save(Tally.deploy(1000n));

      const raw = JSON.parse(fs.readFileSync(stateFile, "utf8"));
      expect(raw.ledger.totalSupply).toBe("1000");
      expect(raw.ledger.balances).toEqual({ [ALICE]: "1000" });
      expect(raw.events).toEqual([{ type: "transfer", from: null, to: ALICE, value: "1000" }]);
    });

    it("should report a missing state file", () => {
      expect(catchError(() => Tally.load())).toMatchObject({
        code: ERROR_CODES.STATE_NOT_FOUND,
        details: { file: stateFile },
      });
    });

    it("should reject an unreadable state file", () => {
      fs.mkdirSync(path.dirname(stateFile), { recursive: true });
      fs.writeFileSync(stateFile, "{ not json");

      expect(catchError(() => Tally.load())).toMatchObject({
        code: ERROR_CODES.INVALID_SNAPSHOT,
      });
    });

    it("should reject a tampered balance", () => {
      Tally.save(Tally.deploy(1000n));
      const raw = JSON.parse(fs.readFileSync(stateFile, "utf8"));
      raw.ledger.balances[BOB] = "1";
      fs.writeFileSync(stateFile, JSON.stringify(raw));

      expect(catchError(() => Tally.load())).toMatchObject({
        code: ERROR_CODES.INVALID_SNAPSHOT,
        message: "Invalid snapshot: balances sum to 1001, total supply is 1000",
      });
    });

    it("should not leave a temporary file behind when a write fails", () => {
      // a non-empty directory where the state file should go makes the rename fail
      fs.mkdirSync(stateFile, { recursive: true });
      fs.writeFileSync(path.join(stateFile, "keep"), "");

      const ledger = Tally.deploy(1n).ledger.snapshot();

      expect(() => writeState(stateFile, { ledger, events: [] })).toThrow();
      expect(fs.existsSync(`${stateFile}.tmp`)).toBe(false);
    });
  });

  describe("Create and commit", () => {
    it("should create a state file for a new ledger", () => {
      const hosted = Tally.create(500n, { metadata: { symbol: "NEW" } });

      expect(Tally.exists()).toBe(true);
      expect(Tally.load().ledger.snapshot()).toEqual(hosted.ledger.snapshot());
    });

    it("should refuse to replace an existing state file", () => {
      Tally.create(500n);
      const before = fs.readFileSync(stateFile, "utf8");

      expect(catchError(() => Tally.create(7n))).toMatchObject({
        code: ERROR_CODES.STATE_EXISTS,
        details: { file: stateFile },
      });
      expect(fs.readFileSync(stateFile, "utf8")).toBe(before);
    });

    it("should replace an existing state file when forced", () => {
      Tally.create(500n);
      Tally.create(7n, { caller: BOB, force: true });

      const { ledger } = Tally.load();
      expect(ledger.totalSupply()).toBe(7n);
      expect(ledger.balanceOf(BOB)).toBe(7n);
      expect(ledger.balanceOf(ALICE)).toBe(0n);
    });

    it("should save the ledger after a successful command", () => {
      Tally.create(500n);
      const hosted = Tally.load();

      const result = Tally.commit(hosted, hosted.ledger.transfer(ALICE, BOB, 200n));

      expect(result).not.toBeInstanceOf(Error);
      const reloaded = Tally.load();
      expect(reloaded.ledger.balanceOf(BOB)).toBe(200n);
      expect(reloaded.events.size).toBe(2);
    });

    it("should leave the state file untouched after a rejected command", () => {
      Tally.create(500n);
      const before = fs.readFileSync(stateFile, "utf8");
      const hosted = Tally.load();

      const result = Tally.commit(hosted, hosted.ledger.transfer(ALICE, BOB, 501n));

      expect(result).toMatchObject({ code: ERROR_CODES.INSUFFICIENT_BALANCE });
      expect(fs.readFileSync(stateFile, "utf8")).toBe(before);
    });

    it("should not write anything for a rejected command on a fresh ledger", () => {
      const hosted = Tally.deploy(10n);

      const result = Tally.commit(hosted, hosted.ledger.transferFrom(BOB, ALICE, CAROL, 1n));

      expect(result).toMatchObject({ code: ERROR_CODES.INSUFFICIENT_ALLOWANCE });
      expect(Tally.exists()).toBe(false);
    });
  });

  describe("Debug output", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("should stay quiet unless debug is on", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});

      Tally.deploy(10n).ledger.transfer(ALICE, BOB, 1n);

      expect(log).not.toHaveBeenCalled();
    });

    it("should log ledger activity and count it", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      await Tally.configure({ debug: true });

      const { ledger } = Tally.deploy(10n);
      ledger.transfer(ALICE, BOB, 4n);
      ledger.approve(BOB, CAROL, 2n);
      ledger.transfer(BOB, CAROL, 5n);

      expect(log).toHaveBeenCalledWith(`\nDeploy: 10 TALLY credited to ${ALICE}`);
      expect(log).toHaveBeenCalledWith(`Transfer: ${ALICE} -> ${BOB} (4)`);
      expect(log).toHaveBeenCalledWith(`Approval: ${BOB} allows ${CAROL} up to 2`);
      expect(log).toHaveBeenCalledWith(
        `Rejected transfer: Insufficient balance: ${BOB} holds 4, requested 5`
      );

      const stats = debugUtils.getStats();
      expect(stats.transfers).toBe(1);
      expect(stats.approvals).toBe(1);
      expect(stats.rejections).toBe(1);
    });
  });
});
