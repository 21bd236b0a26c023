import "dotenv/config";
import { Ledger, type LedgerOptions } from "./ledger";
import { EventLog } from "./events";
import { ERROR_CODES } from "../constants";
import { ErrorUtils } from "../utils";
import { debugUtils } from "../utils/debug";
import { loadConfig, DEFAULT_SDK_CONFIG } from "../utils/config";
import {
  deserializeEvent,
  readState,
  serializeEvent,
  stateExists,
  writeState,
} from "../lib/state";
import type { LedgerError, NetworkName, Principal, Receipt, SDKConfig } from "../types";

export interface DeployOptions extends Omit<LedgerOptions, "sink" | "network"> {
  caller?: Principal;
}

export interface CreateOptions extends DeployOptions {
  /** Replace an existing state file */
  force?: boolean;
}

/**
 * A ledger together with the event log its host keeps for it
 */
export interface HostedLedger {
  ledger: Ledger;
  events: EventLog;
}

export class Tally {
  static config: SDKConfig = DEFAULT_SDK_CONFIG;

  /**
   * Set SDK configuration
   * @param config Partial configuration object
   */
  static async configure(config?: Partial<SDKConfig>): Promise<void> {
    this.config = await loadConfig(config, this.config);
  }

  /**
   * Network principals must belong to, if strict checking is on
   */
  static get network(): NetworkName | undefined {
    return this.config.strictNetwork ? this.config.network : undefined;
  }

  /**
   * Deploy a fresh ledger, crediting the supply to the configured caller
   * unless `options.caller` names someone else
   */
  static deploy(initialSupply: bigint, options: DeployOptions = {}): HostedLedger {
    const { caller = this.config.caller, ...ledgerOptions } = options;
    if (!caller) {
      throw ErrorUtils.createError(
        ERROR_CODES.INVALID_CONFIG,
        "No caller configured: pass --caller, or set TALLY_CALLER, PRIVATE_KEY or SEED_PHRASE"
      );
    }

    const events = new EventLog();
    const ledger = Ledger.deploy(caller, initialSupply, {
      ...ledgerOptions,
      sink: events,
      network: this.network,
    });
    return { ledger, events };
  }

  /**
   * Deploy a ledger and write it to a new state file
   */
  static create(
    initialSupply: bigint,
    options: CreateOptions = {},
    file: string = this.config.stateFile
  ): HostedLedger {
    const { force = false, ...deployOptions } = options;
    if (!force && this.exists(file)) {
      throw ErrorUtils.createError(
        ERROR_CODES.STATE_EXISTS,
        `${file} already exists; use --force to replace it`,
        { file }
      );
    }

    const hosted = this.deploy(initialSupply, deployOptions);
    this.save(hosted, file);
    return hosted;
  }

  /**
   * Persist the outcome of a ledger command. A rejected command is
   * returned as is and nothing is written.
   */
  static commit(
    hosted: HostedLedger,
    result: Receipt | LedgerError,
    file: string = this.config.stateFile
  ): Receipt | LedgerError {
    if (result instanceof Error) return result;
    this.save(hosted, file);
    return result;
  }

  /**
   * State file methods
   */
  static exists(file: string = this.config.stateFile): boolean {
    return stateExists(file);
  }

  static load(file: string = this.config.stateFile): HostedLedger {
    const state = readState(file);
    const events = new EventLog(state.events.map(deserializeEvent));
    const ledger = Ledger.restore(state.ledger, { sink: events, network: this.network });
    debugUtils.logState("load", file, ledger.holders().length);
    return { ledger, events };
  }

  static save({ ledger, events }: HostedLedger, file: string = this.config.stateFile): void {
    writeState(file, {
      ledger: ledger.snapshot(),
      events: events.all().map(serializeEvent),
    });
    debugUtils.logState("save", file, ledger.holders().length);
  }
}
