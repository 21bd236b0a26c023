import { Tally } from "../core/sdk";
import type { LedgerError, Principal } from "../types";

class DebugUtils {
  stats = {
    transfers: 0,
    approvals: 0,
    rejections: 0,
    startTime: 0,
  };

  resetStats() {
    this.stats = {
      transfers: 0,
      approvals: 0,
      rejections: 0,
      startTime: Date.now(),
    };
  }

  getStats() {
    return {
      ...this.stats,
      elapsedMs: Date.now() - this.stats.startTime,
    };
  }

  logDeploy(caller: Principal, supply: bigint, symbol: string) {
    if (!Tally.config.debug) return;
    this.resetStats();
    console.log(`\nDeploy: ${supply} ${symbol} credited to ${caller}`);
  }

  logTransfer(from: Principal, to: Principal, value: bigint) {
    this.stats.transfers++;
    if (!Tally.config.debug) return;
    console.log(`Transfer: ${from} -> ${to} (${value})`);
  }

  logApproval(owner: Principal, spender: Principal, value: bigint) {
    this.stats.approvals++;
    if (!Tally.config.debug) return;
    console.log(`Approval: ${owner} allows ${spender} up to ${value}`);
  }

  logRejection(operation: string, error: LedgerError) {
    this.stats.rejections++;
    if (!Tally.config.debug) return;
    console.log(`Rejected ${operation}: ${error.message}`);
  }

  logState(action: "load" | "save", file: string, holders: number) {
    if (!Tally.config.debug) return;
    console.log(`State ${action}: ${file} (${holders} holders)`);
  }
}

export const debugUtils = new DebugUtils();
