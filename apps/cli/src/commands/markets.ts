/**
 * curvebond markets | market <id> | quote <id> <amount>
 * curvebond create-market | close-market <id>   (administrator key)
 */

import { MarketSummaryV1 } from "@curvebond/primitives";
import type { CliConfig } from "../lib/config.js";
import { httpGetRotate, httpPostRotate } from "../lib/http.js";
import { loadKeys } from "../lib/keys.js";
import { ClosedMarket, CreatedMarket, MarketList, QuoteResponse } from "../lib/responses.js";
import { signNow } from "../lib/sign.js";
import {
  formatUnits,
  nowSeconds,
  parseNonNegativeInt,
  parseRaw,
  parseUnits,
  requireAccount,
} from "../lib/units.js";

export async function marketsCommand(
  config: CliConfig,
  opts: { quoteToken?: string },
): Promise<void> {
  const query = opts.quoteToken ? `?quote_token=${requireAccount(opts.quoteToken, "quote token")}` : "";
  const { markets } = await httpGetRotate(config.depositories, `/markets${query}`, MarketList);

  if (markets.length === 0) {
    console.log("No live markets.");
    return;
  }
  for (const id of markets) {
    const m = await httpGetRotate(config.depositories, `/markets/${id}`, MarketSummaryV1);
    console.log(
      `  #${id}  quote=${m.market.quote_token.slice(0, 12)}…  price=${m.price}  capacity=${m.market.capacity}${m.market.capacity_in_quote ? " (quote)" : ""}`,
    );
  }
}

export async function marketCommand(idArg: string, config: CliConfig): Promise<void> {
  const id = parseNonNegativeInt(idArg, "market id");
  const m = await httpGetRotate(config.depositories, `/markets/${id}`, MarketSummaryV1);
  const now = nowSeconds();

  console.log(`Market #${m.id} ${m.is_live ? "(live)" : "(concluded)"}\n`);
  console.log(`  quote token:      ${m.market.quote_token}`);
  console.log(`  capacity:         ${m.market.capacity}${m.market.capacity_in_quote ? " quote" : " base"}`);
  console.log(`  price:            ${m.price}`);
  console.log(`  control variable: ${m.control_variable}`);
  console.log(`  debt:             ${m.current_debt} (ratio ${m.debt_ratio}, decaying ${m.debt_decay})`);
  console.log(`  max payout:       ${m.market.max_payout}`);
  console.log(`  max debt:         ${m.terms.max_debt}`);
  console.log(`  sold / purchased: ${m.market.sold} / ${m.market.purchased}`);
  console.log(
    `  vesting:          ${m.terms.fixed_term ? `${m.terms.vesting}s after deposit` : `until ${m.terms.vesting}`}`,
  );
  console.log(`  concludes:        ${m.terms.conclusion} (${Math.max(0, m.terms.conclusion - now)}s left)`);
  if (m.adjustment.active) {
    console.log(`  adjusting:        -${m.adjustment.change} over ${m.adjustment.time_to_adjusted}s`);
  }
}

export async function quoteCommand(
  idArg: string,
  amountArg: string,
  config: CliConfig,
  opts: { raw?: boolean },
): Promise<void> {
  const id = parseNonNegativeInt(idArg, "market id");
  const m = await httpGetRotate(config.depositories, `/markets/${id}`, MarketSummaryV1);
  const amount = opts.raw ? parseRaw(amountArg, "amount") : parseUnits(amountArg, m.metadata.quote_decimals);

  const quote = await httpGetRotate(config.depositories, `/markets/${id}/quote?amount=${amount}`, QuoteResponse);
  console.log(`  amount: ${quote.amount} (${formatUnits(BigInt(quote.amount), m.metadata.quote_decimals)} quote)`);
  console.log(`  price:  ${quote.price}`);
  console.log(`  payout: ${quote.payout}`);
}

interface CreateMarketOptions {
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
}

export async function createMarketCommand(config: CliConfig, opts: CreateMarketOptions): Promise<void> {
  if ((opts.vesting === undefined) === (opts.expiry === undefined)) {
    throw new Error("Pass exactly one of --vesting <seconds> or --expiry <timestamp>");
  }
  const keys = await loadKeys(config.keyPath);
  const fixedTerm = opts.vesting !== undefined;

  const body = signNow(keys, {
    action: "market.create" as const,
    quote_token: requireAccount(opts.quoteToken, "quote token"),
    capacity: parseRaw(opts.capacity, "capacity").toString(),
    initial_price: parseRaw(opts.price, "price").toString(),
    debt_buffer: parseNonNegativeInt(opts.buffer, "debt buffer"),
    capacity_in_quote: opts.capacityInQuote ?? false,
    fixed_term: fixedTerm,
    vesting: parseNonNegativeInt(opts.vesting ?? opts.expiry ?? "0", fixedTerm ? "vesting" : "expiry"),
    conclusion: nowSeconds() + parseNonNegativeInt(opts.duration, "duration"),
    deposit_interval: parseNonNegativeInt(opts.depositInterval, "deposit interval"),
    tune_interval: parseNonNegativeInt(opts.tuneInterval, "tune interval"),
  });

  const result = await httpPostRotate(config.depositories, "/markets", body, CreatedMarket);
  console.log(`Created market #${result.market_id}`);
}

export async function closeMarketCommand(idArg: string, config: CliConfig): Promise<void> {
  const id = parseNonNegativeInt(idArg, "market id");
  const keys = await loadKeys(config.keyPath);
  const body = signNow(keys, { action: "market.close" as const, market_id: id });

  await httpPostRotate(config.depositories, `/markets/${id}/close`, body, ClosedMarket);
  console.log(`Closed market #${id}`);
}
