/**
 * curvebond notes [owner] | redeem [indexes] | push <index> <to> | pull <from> <index>
 */

import type { CliConfig } from "../lib/config.js";
import { httpGetRotate, httpPostRotate } from "../lib/http.js";
import { loadKeys } from "../lib/keys.js";
import { NotesResponse, PullResponse, PushResponse, RedeemResponse } from "../lib/responses.js";
import { signNow } from "../lib/sign.js";
import { nowSeconds, parseIndexes, parseNonNegativeInt, requireAccount } from "../lib/units.js";

async function ownerOrSelf(owner: string | undefined, config: CliConfig): Promise<string> {
  if (owner) return requireAccount(owner, "owner");
  return (await loadKeys(config.keyPath)).publicKeyHex;
}

export async function notesCommand(ownerArg: string | undefined, config: CliConfig): Promise<void> {
  const owner = await ownerOrSelf(ownerArg, config);
  const { notes, pending } = await httpGetRotate(config.depositories, `/notes/${owner}`, NotesResponse);
  const now = nowSeconds();

  console.log(`Notes for ${owner}\n`);
  if (notes.length === 0) {
    console.log("  (none)");
    return;
  }
  for (const n of notes) {
    const status =
      n.redeemed !== 0 ? `redeemed at ${n.redeemed}` : n.matured <= now ? "redeemable" : `vests in ${n.matured - now}s`;
    console.log(`  #${n.index}  market=${n.market_id}  payout=${n.payout}  ${status}`);
  }
  console.log(`\n  pending: ${pending.length > 0 ? pending.join(", ") : "(none)"}`);
}

export async function redeemCommand(
  indexesArg: string | undefined,
  config: CliConfig,
  opts: { owner?: string },
): Promise<void> {
  const owner = await ownerOrSelf(opts.owner, config);
  const body = indexesArg ? { indexes: parseIndexes(indexesArg) } : {};

  const result = await httpPostRotate(config.depositories, `/notes/${owner}/redeem`, body, RedeemResponse);
  console.log(result.payout === "0" ? "Nothing redeemable yet." : `Redeemed ${result.payout} to ${owner}`);
}

export async function pushCommand(indexArg: string, toArg: string, config: CliConfig): Promise<void> {
  const keys = await loadKeys(config.keyPath);
  const index = parseNonNegativeInt(indexArg, "note index");
  const to = requireAccount(toArg, "recipient");
  const body = signNow(keys, { action: "note.push" as const, index, to });

  await httpPostRotate(config.depositories, `/notes/${keys.publicKeyHex}/${index}/push`, body, PushResponse);
  console.log(`Note #${index} may now be pulled by ${to}`);
}

export async function pullCommand(fromArg: string, indexArg: string, config: CliConfig): Promise<void> {
  const keys = await loadKeys(config.keyPath);
  const from = requireAccount(fromArg, "sender");
  const index = parseNonNegativeInt(indexArg, "note index");
  const body = signNow(keys, { action: "note.pull" as const, from, index });

  const result = await httpPostRotate(config.depositories, `/notes/${from}/${index}/pull`, body, PullResponse);
  console.log(`Pulled note #${index} from ${from} → your note #${result.index}`);
}
