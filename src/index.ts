// src/index.ts

export { Tally, type CreateOptions, type DeployOptions, type HostedLedger } from "./core/sdk";
export { Ledger, type LedgerOptions } from "./core/ledger";
export {
  EventLog,
  encodeEvent,
  matchesFilter,
  toClarityValue,
  type EventSink,
} from "./core/events";
export { MemoryMapping, type MappingStore } from "./lib/mapping";
export {
  assertPrincipal,
  isContractPrincipal,
  isValidPrincipal,
  principalFromPrivateKey,
} from "./lib/principal";
export { parseSnapshot } from "./lib/snapshot";
export { ErrorUtils } from "./utils";
export { loadConfig, DEFAULT_SDK_CONFIG } from "./utils/config";
export { AMOUNT_LIMITS, ERROR_CODES, type ErrorCode } from "./constants";
export type * from "./types";
