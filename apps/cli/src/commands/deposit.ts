/**
 * curvebond deposit <market_id> <amount>
 *
 * Price the market → sign deposit with a max price → POST → print the note.
 * The max price defaults to the current price plus --slippage basis points.
 */

import { MarketSummaryV1, ZERO_ACCOUNT } from "@curvebond/primitives";
import type { CliConfig } from "../lib/config.js";
import { httpGetRotate, httpPostRotate } from "../lib/http.js";
import { loadKeys } from "../lib/keys.js";
import { DepositResponse } from "../lib/responses.js";
import { signNow } from "../lib/sign.js";
import {
  formatUnits,
  parseNonNegativeInt,
  parseRaw,
  parseUnits,
  requireAccount,
  withSlippage,
} from "../lib/units.js";

interface DepositOptions {
  maxPrice?: string;
  slippage: string;
  recipient?: string;
  referrer?: string;
  raw?: boolean;
}

export async function depositCommand(
  idArg: string,
  amountArg: string,
  config: CliConfig,
  opts: DepositOptions,
): Promise<void> {
  const id = parseNonNegativeInt(idArg, "market id");
  const keys = await loadKeys(config.keyPath);

  const m = await httpGetRotate(config.depositories, `/markets/${id}`, MarketSummaryV1);
  if (!m.is_live) {
    throw new Error(`Market #${id} is concluded`);
  }
  const decimals = m.metadata.quote_decimals;
  const amount = opts.raw ? parseRaw(amountArg, "amount") : parseUnits(amountArg, decimals);
  const maxPrice = opts.maxPrice
    ? parseRaw(opts.maxPrice, "max price")
    : withSlippage(BigInt(m.price), parseNonNegativeInt(opts.slippage, "slippage"));
  const recipient = opts.recipient ? requireAccount(opts.recipient, "recipient") : keys.publicKeyHex;
  const referrer = opts.referrer ? requireAccount(opts.referrer, "referrer") : ZERO_ACCOUNT;

  console.log(`Bonding ${formatUnits(amount, decimals)} quote into market #${id}`);
  console.log(`  price:     ${m.price} (max ${maxPrice})`);
  console.log(`  recipient: ${recipient}`);

  const body = signNow(keys, {
    action: "deposit" as const,
    market_id: id,
    amount: amount.toString(),
    max_price: maxPrice.toString(),
    recipient,
    referrer,
  });

  const result = await httpPostRotate(config.depositories, `/markets/${id}/deposit`, body, DepositResponse);
  console.log();
  console.log(`  note:    #${result.index}`);
  console.log(`  payout:  ${result.payout}`);
  console.log(`  matures: ${result.matured}`);
}
