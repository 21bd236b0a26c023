import { z } from "zod";
import fs from "fs";
import path from "path";
import { homedir } from "os";
import { generateWallet, getStxAddress } from "@stacks/wallet-sdk";
import { ERROR_CODES } from "../constants";
import { ErrorUtils } from "./index";
import { isValidPrincipal, principalFromPrivateKey } from "../lib/principal";
import type { SDKConfig } from "../types";

// Config file locations in order of precedence
export const CONFIG_LOCATIONS = [
  ".tally.json",
  path.join(homedir(), ".tally/config.json"),
  "/etc/tally/config.json",
] as const;

// Default CLI locations
export const CLI_CONFIG_DIR = path.join(homedir(), ".tally");
export const CLI_STATE_FILE = path.join(CLI_CONFIG_DIR, "ledger.json");

export const DEFAULT_SDK_CONFIG: SDKConfig = {
  network: "mainnet",
  debug: false,
  stateFile: CLI_STATE_FILE,
  caller: "",
  strictNetwork: false,
};

const flag = z.preprocess(
  (val) => (typeof val === "string" ? val === "true" : val),
  z.boolean()
);

// Single source of truth for config validation
export const FullConfigSchema = z.object({
  network: z.enum(["mainnet", "testnet"] as const),
  debug: flag,
  stateFile: z.string().min(1),
  caller: z.string(),
  strictNetwork: flag,
});

export const ConfigSchema = FullConfigSchema.partial();

export type ValidatedConfig = z.infer<typeof ConfigSchema>;

// Environment variable mapping
const ENV_VAR_MAP = {
  TALLY_NETWORK: "network",
  TALLY_DEBUG: "debug",
  TALLY_STATE_FILE: "stateFile",
  TALLY_CALLER: "caller",
  TALLY_STRICT_NETWORK: "strictNetwork",
} as const;

function invalidConfig(source: string, error: z.ZodError) {
  const issues = error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
  return ErrorUtils.createError(
    ERROR_CODES.INVALID_CONFIG,
    `Invalid configuration (${source}): ${issues.join("; ")}`,
    { source, issues }
  );
}

function loadEnvironmentConfig(): ValidatedConfig {
  const envConfig: Record<string, unknown> = {};

  for (const [envKey, configKey] of Object.entries(ENV_VAR_MAP)) {
    const value = process.env[envKey];
    if (value) {
      envConfig[configKey] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(envConfig);
  if (!parsed.success) throw invalidConfig("environment", parsed.error);
  return parsed.data;
}

/**
 * Reads the first config file that exists. A file that exists but does
 * not parse or validate is an error, like a bad environment variable.
 */
export function loadFileConfig(
  locations: readonly string[] = CONFIG_LOCATIONS
): ValidatedConfig {
  const location = locations.find((candidate) => fs.existsSync(candidate));
  if (!location) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(location, "utf8"));
  } catch (error) {
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_CONFIG,
      `Invalid configuration (${location}): ${error instanceof Error ? error.message : error}`,
      { source: location }
    );
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) throw invalidConfig(location, parsed.error);
  return parsed.data;
}

// Signer-derived caller, used when no caller is configured explicitly
async function deriveCaller(network: SDKConfig["network"]): Promise<string | undefined> {
  if (process.env.PRIVATE_KEY) {
    return principalFromPrivateKey(process.env.PRIVATE_KEY, network);
  }
  if (process.env.SEED_PHRASE) {
    const wallet = await generateWallet({
      secretKey: process.env.SEED_PHRASE,
      password: "",
    });
    return getStxAddress(wallet.accounts[0], network);
  }
  return undefined;
}

/**
 * Load and validate configuration.
 *
 * Later sources override earlier ones: defaults, `base` (the currently
 * active config), config file, environment, runtime overrides.
 */
export async function loadConfig(
  runtimeConfig?: Partial<SDKConfig>,
  base: SDKConfig = DEFAULT_SDK_CONFIG
): Promise<SDKConfig> {
  const runtime = ConfigSchema.safeParse(runtimeConfig ?? {});
  if (!runtime.success) throw invalidConfig("runtime", runtime.error);

  const merged = {
    ...DEFAULT_SDK_CONFIG,
    ...base,
    ...loadFileConfig(),
    ...loadEnvironmentConfig(),
    ...runtime.data,
  };

  const validated = FullConfigSchema.safeParse(merged);
  if (!validated.success) throw invalidConfig("merged", validated.error);
  const config: SDKConfig = validated.data;

  if (!config.caller) {
    config.caller = (await deriveCaller(config.network)) ?? "";
  }

  if (
    config.caller &&
    !isValidPrincipal(config.caller, config.strictNetwork ? config.network : undefined)
  ) {
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_CONFIG,
      config.strictNetwork
        ? `Invalid configuration: caller ${config.caller} is not a ${config.network} principal`
        : `Invalid configuration: caller ${config.caller} is not a valid principal`,
      { caller: config.caller }
    );
  }

  return config;
}
