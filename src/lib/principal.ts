import {
  getAddressFromPrivateKey,
  validateStacksAddress,
} from "@stacks/transactions";
import { networkFrom } from "@stacks/network";
import {
  ADDRESS_PREFIXES,
  CONTRACT_NAME_PATTERN,
  ERROR_CODES,
} from "../constants";
import { ErrorUtils } from "../utils";
import type { NetworkName, Principal } from "../types";

/**
 * Checks a standard or contract principal. When `network` is given the
 * address must also carry that network's version prefix.
 */
export function isValidPrincipal(value: string, network?: NetworkName): boolean {
  const [address, contractName, ...rest] = value.split(".");
  if (rest.length > 0) return false;
  if (contractName !== undefined && !CONTRACT_NAME_PATTERN.test(contractName)) {
    return false;
  }
  if (!validateStacksAddress(address)) return false;
  if (network) {
    const prefixes: readonly string[] = ADDRESS_PREFIXES[network];
    return prefixes.includes(address.slice(0, 2));
  }
  return true;
}

export function assertPrincipal(value: string, network?: NetworkName): Principal {
  if (!isValidPrincipal(value, network)) {
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_PRINCIPAL,
      network
        ? `Invalid ${network} principal: ${value}`
        : `Invalid principal: ${value}`,
      { principal: value, network }
    );
  }
  return value;
}

export function isContractPrincipal(value: Principal): boolean {
  return value.includes(".");
}

/**
 * Derives the standard principal that signs with the given private key
 */
export function principalFromPrivateKey(
  privateKey: string,
  network: NetworkName = "mainnet"
): Principal {
  return getAddressFromPrivateKey(privateKey, networkFrom(network));
}
