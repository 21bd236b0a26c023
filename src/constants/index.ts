// src/constants/index.ts

export const ERROR_CODES = {
  // Business Logic Errors (1000-1999)
  INSUFFICIENT_BALANCE: 1002,
  INSUFFICIENT_ALLOWANCE: 1003,
  BALANCE_OVERFLOW: 1004,
  INVALID_AMOUNT: 1005,
  INVALID_PRINCIPAL: 1006,
  INVALID_SNAPSHOT: 1007,
  INVALID_CONFIG: 1009,

  // System Errors (2000-2999)
  STATE_NOT_FOUND: 2001,
  STATE_EXISTS: 2002,
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const AMOUNT_LIMITS = {
  MIN: 0n,
  MAX: 2n ** 128n - 1n, // Clarity uint128
} as const;

export const DEFAULT_TOKEN_METADATA = {
  name: "Tally Token",
  symbol: "TALLY",
  decimals: 6,
} as const;

// Version prefixes of c32 addresses per network
export const ADDRESS_PREFIXES = {
  mainnet: ["SP", "SM"],
  testnet: ["ST", "SN"],
} as const;

// Clarity contract names: letter first, then letters, digits, '-' or '_'
export const CONTRACT_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9\-_]{0,127}$/;

export const SNAPSHOT_VERSION = 1;
