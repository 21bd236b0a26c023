/**
 * Account Types
 */

/**
 * A Stacks principal: a standard address ("SP…", "ST…") or a contract
 * identifier ("SP….contract-name").
 */
export type Principal = string;

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
  tokenUri?: string;
}

/**
 * Event Types
 */
export interface TransferEvent {
  type: "transfer";
  from: Principal | null;
  to: Principal | null;
  value: bigint;
}

export interface ApprovalEvent {
  type: "approval";
  owner: Principal;
  spender: Principal;
  value: bigint;
}

export type LedgerEvent = TransferEvent | ApprovalEvent;

/** Indexed event fields an observer can filter on */
export interface EventFilter {
  from?: Principal;
  to?: Principal;
  owner?: Principal;
  spender?: Principal;
}

/**
 * Result Types
 */
export interface Receipt {
  events: LedgerEvent[];
}

/**
 * Snapshot Types
 *
 * Amounts are decimal strings so the snapshot survives JSON.
 */
export interface AllowanceEntry {
  owner: Principal;
  spender: Principal;
  value: string;
}

export interface LedgerSnapshot {
  version: 1;
  metadata: TokenMetadata;
  totalSupply: string;
  balances: Record<Principal, string>;
  allowances: AllowanceEntry[];
}

/**
 * Options Types
 */
export type NetworkName = "mainnet" | "testnet";

export interface SDKConfig {
  network: NetworkName;
  debug: boolean;
  stateFile: string;
  caller: Principal;
  strictNetwork: boolean;
}

/**
 * Error Types
 */
export interface LedgerError extends Error {
  code: number;
  details?: Record<string, unknown>;
}
