#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { Tally, type HostedLedger } from "./core/sdk";
import { encodeEvent } from "./core/events";
import { assertPrincipal } from "./lib/principal";
import { ErrorUtils } from "./utils";
import { formatAmount, parseAmount } from "./utils/format";
import { ERROR_CODES } from "./constants";
import type { LedgerEvent, NetworkName, Receipt, LedgerError, SDKConfig } from "./types";

// Initialize program
const program = new Command();

program
  .name("tally")
  .description("CLI for a fungible-token ledger with ERC20 semantics")
  .version(process.env.npm_package_version || require("../package.json").version);

// Global options
program
  .option("-n, --network <network>", "Network principals belong to (mainnet/testnet)")
  .option("-s, --state <file>", "Ledger state file")
  .option("-c, --caller <principal>", "Principal the command is sent as")
  .option("-d, --debug", "Print debug output")
  .hook("preAction", async (thisCommand) => {
    const options = thisCommand.opts<{
      network?: NetworkName;
      state?: string;
      caller?: string;
      debug?: boolean;
    }>();

    const overrides: Partial<SDKConfig> = {};
    if (options.network) overrides.network = options.network;
    if (options.state) overrides.stateFile = options.state;
    if (options.caller) overrides.caller = options.caller;
    if (options.debug) overrides.debug = true;
    await Tally.configure(overrides);
  });

function describeError(error: unknown): string {
  if (ErrorUtils.isLedgerError(error)) return `${error.message} ${chalk.gray(`(code ${error.code})`)}`;
  return error instanceof Error ? error.message : String(error);
}

// Shared error reporting for every command
function run<A extends unknown[]>(action: (...args: A) => Promise<void> | void) {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      console.error(chalk.red("Error:"), describeError(error));
      process.exit(1);
    }
  };
}

function requireCaller(): string {
  if (!Tally.config.caller) {
    throw ErrorUtils.createError(
      ERROR_CODES.INVALID_CONFIG,
      "No caller configured: pass --caller, or set TALLY_CALLER, PRIVATE_KEY or SEED_PHRASE"
    );
  }
  return Tally.config.caller;
}

function loadLedger(): HostedLedger {
  const spinner = ora("Loading ledger state...").start();
  try {
    const hosted = Tally.load();
    spinner.stop();
    return hosted;
  } catch (error) {
    spinner.fail("Could not load ledger state");
    throw error;
  }
}


function describeEvent(event: LedgerEvent, hosted: HostedLedger): string {
  const { ledger } = hosted;
  const amount = `${chalk.yellow(formatAmount(event.value, ledger.decimals()))} ${ledger.symbol()}`;
  if (event.type === "transfer") {
    const from = event.from ?? chalk.gray("(mint)");
    const to = event.to ?? chalk.gray("(none)");
    return `${chalk.cyan("Transfer")}  ${from} → ${to}  ${amount}`;
  }
  return `${chalk.magenta("Approval")}  ${event.owner} allows ${event.spender}  ${amount}`;
}

// Save and report on success; a rejected command leaves the state file alone
function settle(hosted: HostedLedger, result: Receipt | LedgerError) {
  const spinner = ora("Saving ledger state...").start();
  const receipt = Tally.commit(hosted, result);
  if (receipt instanceof Error) {
    spinner.fail("Command rejected, state unchanged");
    throw receipt;
  }
  spinner.succeed(`Saved ${chalk.gray(Tally.config.stateFile)}`);
  receipt.events.forEach((event) => console.log(describeEvent(event, hosted)));
}

// Deployment
program
  .command("deploy")
  .description("Create a new ledger and credit the whole supply to the caller")
  .argument("<supply>", "Initial supply (in base units)")
  .option("--name <name>", "Token name")
  .option("--symbol <symbol>", "Token symbol")
  .option("--decimals <decimals>", "Token decimals", (value) => parseInt(value, 10))
  .option("--uri <uri>", "Token metadata URI")
  .option("-f, --force", "Overwrite an existing state file")
  .action(
    run(
      async (
        supply: string,
        options: { name?: string; symbol?: string; decimals?: number; uri?: string; force?: boolean }
      ) => {
        const metadata: { name?: string; symbol?: string; decimals?: number; tokenUri?: string } = {};
        if (options.name) metadata.name = options.name;
        if (options.symbol) metadata.symbol = options.symbol;
        if (options.decimals !== undefined) metadata.decimals = options.decimals;
        if (options.uri) metadata.tokenUri = options.uri;

        const spinner = ora("Deploying ledger...").start();
        let hosted: HostedLedger;
        try {
          hosted = Tally.create(parseAmount(supply), {
            caller: requireCaller(),
            metadata,
            force: options.force,
          });
        } catch (error) {
          spinner.fail("Deploy failed");
          throw error;
        }
        spinner.succeed(`Saved ${chalk.gray(Tally.config.stateFile)}`);
        hosted.events.all().forEach((event) => console.log(describeEvent(event, hosted)));
      }
    )
  );

// Inspection Commands
program
  .command("info")
  .description("Show token metadata and supply")
  .action(
    run(() => {
      const hosted = loadLedger();
      const { ledger } = hosted;

      console.log("\nToken Details:");
      console.log("─────────────────────────────────");
      console.log(`Name:          ${chalk.cyan(ledger.name())}`);
      console.log(`Symbol:        ${chalk.yellow(ledger.symbol())}`);
      console.log(`Decimals:      ${ledger.decimals()}`);
      console.log(`Token URI:     ${ledger.tokenUri() ?? chalk.gray("none")}`);
      console.log(
        `Total Supply:  ${chalk.yellow(formatAmount(ledger.totalSupply(), ledger.decimals()))} (${ledger.totalSupply()} base units)`
      );
      console.log(`Holders:       ${ledger.holders().filter(([, value]) => value > 0n).length}`);
      console.log(`Events:        ${hosted.events.size}`);
    })
  );

program
  .command("balance")
  .description("Show the balance of an account")
  .argument("[account]", "Principal to inspect (defaults to the caller)")
  .action(
    run((account?: string) => {
      const { ledger } = loadLedger();
      const target = assertPrincipal(account ?? requireCaller(), Tally.network);
      const balance = ledger.balanceOf(target);
      console.log(`${target}: ${chalk.yellow(formatAmount(balance, ledger.decimals()))} ${ledger.symbol()}`);
    })
  );

program
  .command("allowance")
  .description("Show how much a spender may move on behalf of an owner")
  .argument("<owner>", "Owner principal")
  .argument("<spender>", "Spender principal")
  .action(
    run((owner: string, spender: string) => {
      const { ledger } = loadLedger();
      const value = ledger.allowance(
        assertPrincipal(owner, Tally.network),
        assertPrincipal(spender, Tally.network)
      );
      console.log(
        `${spender} may spend ${chalk.yellow(formatAmount(value, ledger.decimals()))} ${ledger.symbol()} of ${owner}`
      );
    })
  );

program
  .command("holders")
  .description("List every account with a stored balance")
  .action(
    run(() => {
      const { ledger } = loadLedger();
      const holders = ledger.holders().sort(([, a], [, b]) => (a === b ? 0 : a > b ? -1 : 1));

      console.log("\nHolders:");
      console.log("─────────────────────────────────");
      holders.forEach(([account, value]) => {
        console.log(`${account.padEnd(42)} ${chalk.yellow(formatAmount(value, ledger.decimals()))}`);
      });
    })
  );

program
  .command("events")
  .description("List recorded events, optionally filtered by indexed fields")
  .option("--from <principal>", "Transfer sender")
  .option("--to <principal>", "Transfer recipient")
  .option("--owner <principal>", "Approval owner")
  .option("--spender <principal>", "Approval spender")
  .option("--hex", "Print each event as a hex-encoded Clarity value")
  .action(
    run((options: { from?: string; to?: string; owner?: string; spender?: string; hex?: boolean }) => {
      const hosted = loadLedger();
      const { hex, ...filter } = options;
      const events = hosted.events.filter(filter);

      if (events.length === 0) {
        console.log(chalk.gray("No matching events"));
        return;
      }
      events.forEach((event) => {
        console.log(hex ? encodeEvent(event) : describeEvent(event, hosted));
      });
    })
  );

// Ledger Commands
program
  .command("transfer")
  .description("Transfer tokens from the caller")
  .argument("<to>", "Recipient principal")
  .argument("<value>", "Amount (in base units)")
  .action(
    run((to: string, value: string) => {
      const hosted = loadLedger();
      settle(hosted, hosted.ledger.transfer(requireCaller(), to, parseAmount(value)));
    })
  );

program
  .command("approve")
  .description("Set how much a spender may transfer on the caller's behalf")
  .argument("<spender>", "Spender principal")
  .argument("<value>", "Allowance (in base units), replaces any previous allowance")
  .action(
    run((spender: string, value: string) => {
      const hosted = loadLedger();
      settle(hosted, hosted.ledger.approve(requireCaller(), spender, parseAmount(value)));
    })
  );

program
  .command("transfer-from")
  .description("Transfer tokens on behalf of an owner, using the caller's allowance")
  .argument("<from>", "Owner principal")
  .argument("<to>", "Recipient principal")
  .argument("<value>", "Amount (in base units)")
  .action(
    run((from: string, to: string, value: string) => {
      const hosted = loadLedger();
      settle(hosted, hosted.ledger.transferFrom(requireCaller(), from, to, parseAmount(value)));
    })
  );

// Configuration Commands
program
  .command("config")
  .description("Show the active configuration")
  .action(
    run(() => {
      const currentConfig = Tally.config;

      console.log("\nCurrent Configuration:");
      console.log("─────────────────────");
      Object.entries(currentConfig).forEach(([key, value]) => {
        const shown = value === "" ? chalk.gray("not set") : String(value);
        console.log(`${chalk.cyan(key.padEnd(16))}: ${shown}`);
      });
    })
  );

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red("Error:"), describeError(error));
  process.exit(1);
});
