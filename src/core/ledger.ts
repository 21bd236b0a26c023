import { AMOUNT_LIMITS, DEFAULT_TOKEN_METADATA, ERROR_CODES } from "../constants";
import { ErrorUtils } from "../utils";
import { debugUtils } from "../utils/debug";
import { MemoryMapping, type MappingStore } from "../lib/mapping";
import { assertPrincipal } from "../lib/principal";
import { MetadataSchema, parseSnapshot } from "../lib/snapshot";
import { EventLog, type EventSink } from "./events";
import type {
  LedgerError,
  LedgerEvent,
  LedgerSnapshot,
  NetworkName,
  Principal,
  Receipt,
  TokenMetadata,
  TransferEvent,
} from "../types";

export interface LedgerOptions {
  metadata?: Partial<TokenMetadata>;
  balances?: MappingStore<Principal, bigint>;
  allowances?: MappingStore<[Principal, Principal], bigint>;
  sink?: EventSink;
  /** When set, every principal must belong to this network */
  network?: NetworkName;
}

/**
 * Fungible-token ledger with ERC20 / SIP-010 semantics.
 *
 * The total supply is fixed at deploy time. Commands take the caller
 * explicitly and either return a {@link Receipt} or a {@link LedgerError}
 * value; every check runs before the first write, so a rejected command
 * leaves balances and allowances untouched. Malformed arguments and
 * arithmetic overflow throw instead.
 */
export class Ledger {
  private readonly balances: MappingStore<Principal, bigint>;
  private readonly allowances: MappingStore<[Principal, Principal], bigint>;
  private readonly sink: EventSink;
  private readonly network?: NetworkName;
  private readonly info: TokenMetadata;

  private constructor(
    private readonly supply: bigint,
    options: LedgerOptions
  ) {
    this.balances = options.balances ?? MemoryMapping.byString<bigint>();
    this.allowances = options.allowances ?? MemoryMapping.byPair<bigint>();
    this.sink = options.sink ?? new EventLog();
    this.network = options.network;
    this.info = parseMetadata({ ...DEFAULT_TOKEN_METADATA, ...options.metadata });
  }

  /**
   * Creates a ledger and credits the whole supply to `caller`.
   * Emits the mint transfer (`from: null`).
   */
  static deploy(
    caller: Principal,
    initialSupply: bigint,
    options: LedgerOptions = {}
  ): Ledger {
    assertPrincipal(caller, options.network);
    assertAmount(initialSupply, "initialSupply");

    const ledger = new Ledger(initialSupply, options);
    ledger.assertEmptyStores("Deploy");

    ledger.balances.insert(caller, initialSupply);
    ledger.sink.emit({ type: "transfer", from: null, to: caller, value: initialSupply });
    debugUtils.logDeploy(caller, initialSupply, ledger.info.symbol);
    return ledger;
  }

  /**
   * Rebuilds a ledger from a snapshot. No events are emitted.
   */
  static restore(snapshot: unknown, options: LedgerOptions = {}): Ledger {
    const data = parseSnapshot(snapshot, options.network);
    const ledger = new Ledger(BigInt(data.totalSupply), {
      ...options,
      metadata: { ...data.metadata, ...options.metadata },
    });
    ledger.assertEmptyStores("Restore");

    for (const [account, value] of Object.entries(data.balances)) {
      ledger.balances.insert(account, BigInt(value));
    }
    for (const { owner, spender, value } of data.allowances) {
      ledger.allowances.insert([owner, spender], BigInt(value));
    }
    return ledger;
  }

  // -----------
  //  Queries
  // -----------
  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(account: Principal): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: Principal, spender: Principal): bigint {
    return this.allowances.get([owner, spender]) ?? 0n;
  }

  metadata(): TokenMetadata {
    return { ...this.info };
  }

  name(): string {
    return this.info.name;
  }

  symbol(): string {
    return this.info.symbol;
  }

  decimals(): number {
    return this.info.decimals;
  }

  tokenUri(): string | null {
    return this.info.tokenUri ?? null;
  }

  /**
   * Every stored balance, including stored zeros
   */
  holders(): Array<[Principal, bigint]> {
    return this.balances.entries();
  }

  // -----------
  //  Commands
  // -----------
  transfer(caller: Principal, to: Principal, value: bigint): Receipt | LedgerError {
    this.checkArguments({ caller, to }, value);

    const event = this.transferFromTo(caller, to, value);
    if (event instanceof Error) {
      debugUtils.logRejection("transfer", event);
      return event;
    }
    return { events: [event] };
  }

  /**
   * Sets the allowance of `spender` over the caller's tokens, replacing
   * any previous value.
   *
   * The overwrite is the standard ERC20 contract and carries its known
   * race: a spender who sees an allowance change pending can spend the old
   * allowance first and the new one afterwards. Owners lowering an
   * allowance should set it to zero and confirm before setting a new value.
   */
  approve(caller: Principal, spender: Principal, value: bigint): Receipt {
    this.checkArguments({ caller, spender }, value);

    this.allowances.insert([caller, spender], value);
    const event: LedgerEvent = { type: "approval", owner: caller, spender, value };
    this.sink.emit(event);
    debugUtils.logApproval(caller, spender, value);
    return { events: [event] };
  }

  /**
   * Moves `value` from `from` to `to` on the caller's allowance.
   * The allowance is checked first but only consumed once the balance
   * transfer has gone through.
   */
  transferFrom(
    caller: Principal,
    from: Principal,
    to: Principal,
    value: bigint
  ): Receipt | LedgerError {
    this.checkArguments({ caller, from, to }, value);

    const allowed = this.allowance(from, caller);
    if (allowed < value) {
      const error = ErrorUtils.createError(
        ERROR_CODES.INSUFFICIENT_ALLOWANCE,
        `Insufficient allowance: ${caller} may spend ${allowed} of ${from}, requested ${value}`,
        {
          owner: from,
          spender: caller,
          allowance: allowed.toString(),
          requested: value.toString(),
        }
      );
      debugUtils.logRejection("transferFrom", error);
      return error;
    }

    const event = this.transferFromTo(from, to, value);
    if (event instanceof Error) {
      debugUtils.logRejection("transferFrom", event);
      return event;
    }

    this.allowances.insert([from, caller], allowed - value);
    return { events: [event] };
  }

  /**
   * JSON-safe copy of the ledger state
   */
  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      metadata: this.metadata(),
      totalSupply: this.supply.toString(),
      balances: Object.fromEntries(
        this.balances.entries().map(([account, value]) => [account, value.toString()])
      ),
      allowances: this.allowances.entries().map(([[owner, spender], value]) => ({
        owner,
        spender,
        value: value.toString(),
      })),
    };
  }

  private transferFromTo(
    from: Principal,
    to: Principal,
    value: bigint
  ): TransferEvent | LedgerError {
    const fromBalance = this.balanceOf(from);
    if (fromBalance < value) {
      return ErrorUtils.createError(
        ERROR_CODES.INSUFFICIENT_BALANCE,
        `Insufficient balance: ${from} holds ${fromBalance}, requested ${value}`,
        { account: from, balance: fromBalance.toString(), requested: value.toString() }
      );
    }

    // Credit is computed after the debit so a self-transfer nets to zero
    const toBalance = from === to ? fromBalance - value : this.balanceOf(to);
    const credited = toBalance + value;
    if (credited > AMOUNT_LIMITS.MAX) {
      throw ErrorUtils.createError(
        ERROR_CODES.BALANCE_OVERFLOW,
        `Balance overflow: crediting ${value} to ${to} exceeds uint128`,
        { account: to, balance: toBalance.toString(), value: value.toString() }
      );
    }

    this.balances.insert(from, fromBalance - value);
    this.balances.insert(to, credited);

    const event: TransferEvent = { type: "transfer", from, to, value };
    this.sink.emit(event);
    debugUtils.logTransfer(from, to, value);
    return event;
  }

  private assertEmptyStores(operation: "Deploy" | "Restore") {
    const balances = this.balances.entries().length;
    const allowances = this.allowances.entries().length;
    if (balances > 0 || allowances > 0) {
      throw ErrorUtils.createError(
        ERROR_CODES.INVALID_CONFIG,
        `${operation} requires empty balance and allowance stores`,
        { balances, allowances }
      );
    }
  }

  private checkArguments(principals: Record<string, Principal>, value: bigint) {
    for (const principal of Object.values(principals)) {
      assertPrincipal(principal, this.network);
    }
    assertAmount(value, "value");
  }
}

function parseMetadata(metadata: TokenMetadata): TokenMetadata {
  const parsed = MetadataSchema.safeParse(metadata);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_CONFIG,
      `Invalid token metadata: ${issues.join("; ")}`,
      { issues }
    );
  }
  return parsed.data;
}

function assertAmount(value: bigint, field: string): void {
  if (value < AMOUNT_LIMITS.MIN || value > AMOUNT_LIMITS.MAX) {
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_AMOUNT,
      `Invalid ${field}: ${value} is outside 0..2^128-1`,
      { field, value: value.toString() }
    );
  }
}
