/**
 * curvebond rewards [account] | claim
 *
 * Front-end rewards accrue in base tokens to whitelisted referrers and the DAO.
 */

import type { CliConfig } from "../lib/config.js";
import { httpGetRotate, httpPostRotate } from "../lib/http.js";
import { loadKeys } from "../lib/keys.js";
import { ClaimResponse, RewardsResponse } from "../lib/responses.js";
import { signNow } from "../lib/sign.js";
import { requireAccount } from "../lib/units.js";

export async function rewardsCommand(accountArg: string | undefined, config: CliConfig): Promise<void> {
  const account = accountArg
    ? requireAccount(accountArg, "account")
    : (await loadKeys(config.keyPath)).publicKeyHex;
  const { rewards } = await httpGetRotate(config.depositories, `/rewards/${account}`, RewardsResponse);
  console.log(`  ${account}: ${rewards}`);
}

export async function claimCommand(config: CliConfig): Promise<void> {
  const keys = await loadKeys(config.keyPath);
  const body = signNow(keys, { action: "rewards.claim" as const });

  const result = await httpPostRotate(config.depositories, "/rewards/claim", body, ClaimResponse);
  console.log(result.amount === "0" ? "No rewards to claim." : `Claimed ${result.amount} to ${result.account}`);
}
