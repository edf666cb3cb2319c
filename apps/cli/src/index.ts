#!/usr/bin/env node
/**
 * curvebond CLI — bond markets from the terminal.
 *
 * Commands:
 *   keygen                          Generate Ed25519 keypair
 *   config                          Show/set CLI configuration
 *   markets                         List live markets
 *   market <id>                     Market records + pricing views
 *   quote <id> <amount>             Payout for an amount of quote token
 *   deposit <id> <amount>           Buy a bond → note
 *   notes [owner]                   List notes
 *   redeem [indexes]                Redeem matured notes
 *   push <index> <to>               Allow <to> to pull one of your notes
 *   pull <from> <index>             Take a note pushed to you
 *   rewards [account]               Accrued front-end rewards
 *   claim                           Claim your front-end rewards
 *   create-market / close-market    Administrator only
 */

import { Command } from "commander";
import { loadConfig, type CliConfig } from "./lib/config.js";
import { keygenCommand } from "./commands/keygen.js";
import { configCommand } from "./commands/config-cmd.js";
import {
  closeMarketCommand,
  createMarketCommand,
  marketCommand,
  marketsCommand,
  quoteCommand,
} from "./commands/markets.js";
import { depositCommand } from "./commands/deposit.js";
import { notesCommand, pullCommand, pushCommand, redeemCommand } from "./commands/notes.js";
import { claimCommand, rewardsCommand } from "./commands/rewards.js";

const program = new Command();

program
  .name("curvebond")
  .description("Bond quote tokens for vesting base tokens at a bonding-curve price")
  .version("0.1.0")
  .option("-d, --depository <url>", "Depository URL override");

/** Config with the global --depository override applied. */
async function configFor(): Promise<CliConfig> {
  const config = await loadConfig();
  const override = program.opts<{ depository?: string }>().depository;
  if (override) {
    config.depository = override;
    config.depositories = [override];
  }
  return config;
}

// ── keys + config ───────────────────────────────────────────────────

program
  .command("keygen")
  .description("Generate Ed25519 keypair → ~/.curvebond/key.json")
  .option("--force", "Overwrite existing key file")
  .action(async (opts: { force?: boolean }) => {
    await keygenCommand(await configFor(), opts);
  });

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("--set-depository <url>", "Set primary depository URL")
  .option("--key-path <path>", "Set key file path")
  .action(async (opts: { setDepository?: string; keyPath?: string }) => {
    await configCommand({ depository: opts.setDepository, keyPath: opts.keyPath });
  });

// ── markets ─────────────────────────────────────────────────────────

program
  .command("markets")
  .description("List live markets")
  .option("-q, --quote-token <hex>", "Only markets for this quote token")
  .action(async (opts: { quoteToken?: string }) => {
    await marketsCommand(await configFor(), opts);
  });

program
  .command("market")
  .description("Show one market")
  .argument("<id>", "Market id")
  .action(async (id: string) => {
    await marketCommand(id, await configFor());
  });

program
  .command("quote")
  .description("Price a deposit without making it")
  .argument("<id>", "Market id")
  .argument("<amount>", "Quote amount (decimal, or base units with --raw)")
  .option("--raw", "Amount is in quote base units")
  .action(async (id: string, amount: string, opts: { raw?: boolean }) => {
    await quoteCommand(id, amount, await configFor(), opts);
  });

program
  .command("deposit")
  .description("Bond quote tokens → vesting note")
  .argument("<id>", "Market id")
  .argument("<amount>", "Quote amount (decimal, or base units with --raw)")
  .option("--raw", "Amount is in quote base units")
  .option("--max-price <units>", "Reject above this price (overrides --slippage)")
  .option("--slippage <bps>", "Max price above current, in basis points", "100")
  .option("--recipient <hex>", "Note owner (default: your key)")
  .option("--referrer <hex>", "Front-end referrer account")
  .action(
    async (
      id: string,
      amount: string,
      opts: { raw?: boolean; maxPrice?: string; slippage: string; recipient?: string; referrer?: string },
    ) => {
      await depositCommand(id, amount, await configFor(), opts);
    },
  );

// ── notes ───────────────────────────────────────────────────────────

program
  .command("notes")
  .description("List notes and pending indexes")
  .argument("[owner]", "Owner account (default: your key)")
  .action(async (owner: string | undefined) => {
    await notesCommand(owner, await configFor());
  });

program
  .command("redeem")
  .description("Redeem matured notes (all pending when no indexes)")
  .argument("[indexes]", "Comma-separated note indexes")
  .option("--owner <hex>", "Redeem for another owner (pays the owner)")
  .action(async (indexes: string | undefined, opts: { owner?: string }) => {
    await redeemCommand(indexes, await configFor(), opts);
  });

program
  .command("push")
  .description("Allow another account to pull one of your notes")
  .argument("<index>", "Your note index")
  .argument("<to>", "Recipient account")
  .action(async (index: string, to: string) => {
    await pushCommand(index, to, await configFor());
  });

program
  .command("pull")
  .description("Take a note that was pushed to you")
  .argument("<from>", "Sender account")
  .argument("<index>", "Sender's note index")
  .action(async (from: string, index: string) => {
    await pullCommand(from, index, await configFor());
  });

// ── rewards ─────────────────────────────────────────────────────────

program
  .command("rewards")
  .description("Show accrued front-end rewards")
  .argument("[account]", "Account (default: your key)")
  .action(async (account: string | undefined) => {
    await rewardsCommand(account, await configFor());
  });

program
  .command("claim")
  .description("Claim your front-end rewards")
  .action(async () => {
    await claimCommand(await configFor());
  });

// ── administrator ───────────────────────────────────────────────────

program
  .command("create-market")
  .description("Create a bond market (administrator key)")
  .requiredOption("--quote-token <hex>", "Quote token address")
  .requiredOption("--capacity <units>", "Capacity in base units (quote units with --capacity-in-quote)")
  .requiredOption("--price <units>", "Initial price, quote per base at base decimals")
  .option("--capacity-in-quote", "Capacity is denominated in quote token")
  .option("--buffer <n>", "Debt buffer, 3-decimal percent (100000 = 100%)", "100000")
  .option("--vesting <seconds>", "Fixed-term vesting length")
  .option("--expiry <timestamp>", "Fixed-expiry vesting timestamp")
  .option("--duration <seconds>", "Seconds until conclusion", "604800")
  .option("--deposit-interval <seconds>", "Target seconds between deposits", "21600")
  .option("--tune-interval <seconds>", "Seconds between tunes", "86400")
  .action(
    async (opts: {
      quoteToken: string;
      capacity: string;
      price: string;
      capacityInQuote?: boolean;
      buffer: string;
      vesting?: string;
      expiry?: string;
      duration: string;
      depositInterval: string;
      tuneInterval: string;
    }) => {
      await createMarketCommand(await configFor(), opts);
    },
  );

program
  .command("close-market")
  .description("Conclude a market now (administrator key)")
  .argument("<id>", "Market id")
  .action(async (id: string) => {
    await closeMarketCommand(id, await configFor());
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
