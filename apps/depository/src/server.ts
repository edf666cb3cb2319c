/**
 * Depository server — bond markets over HTTP.
 *
 * Owns: market ledger, note ledger, front-end rewards, event log.
 * Token movement goes through TokenAsset; in dev mode the base and quote
 * tokens are MemoryTokens built from config.
 *
 * Routes:
 *   GET  /health                     — liveness
 *   GET  /markets                    — live market ids (?quote_token=)
 *   GET  /markets/:id                — market summary
 *   GET  /markets/:id/quote          — payout for ?amount=
 *   POST /markets                    — create market (signed, admin)
 *   POST /markets/:id/close          — close market (signed, admin)
 *   POST /markets/:id/deposit        — buy a bond (signed)
 *   GET  /notes/:owner               — notes + pending indexes
 *   GET  /notes/:owner/:index        — one note + pending status
 *   POST /notes/:owner/redeem        — redeem matured notes
 *   POST /notes/:owner/:index/push   — grant a note transfer (signed, owner)
 *   POST /notes/:owner/:index/pull   — take a granted note (signed, recipient)
 *   GET  /rewards/:account           — accrued front-end rewards
 *   POST /rewards/claim              — claim rewards (signed)
 *   POST /admin/{rewards,whitelist,treasury,dao} — settings (signed, admin)
 *   GET  /events                     — hash-chained event log (?since=)
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyError } from "fastify";
import { isBondError, type BondErrorCode } from "@curvebond/primitives";
import { MemoryToken, TokenRegistry } from "@curvebond/token-client";
import { config } from "./config.js";
import { SingleAdministrator } from "./admin.js";
import { systemClock, type Clock } from "./clock.js";
import { BondDepository, type DepositoryLogger } from "./depository.js";
import { INVALID_REQUEST, type RouteContext } from "./routes/context.js";
import { ReplayGuard } from "./signed.js";
import { healthRoutes } from "./routes/health.js";
import { marketRoutes } from "./routes/markets.js";
import { noteRoutes } from "./routes/notes.js";
import { rewardRoutes } from "./routes/rewards.js";
import { eventRoutes } from "./routes/events.js";

export interface DepositoryDeps {
  depository?: BondDepository;
  clock?: Clock;
  logLevel?: string;
  signatureMaxAgeSec?: number;
}

/** HTTP status for a BondError code. */
export function statusFor(code: BondErrorCode): number {
  switch (code) {
    case "MarketNotFound":
    case "NoteNotFound":
      return 404;
    case "Unauthorized":
      return 403;
    case "TransferFailed":
      return 502;
    default:
      return 422;
  }
}

export type DevTokenSettings = Pick<
  typeof config,
  "baseToken" | "quoteTokens" | "devBalances" | "depositoryAccount"
>;

/**
 * Dev mode tokens: base supply minted to the vault; each dev balance minted
 * on every quote token with the depository approved to spend it.
 */
export function createDevTokens(settings: DevTokenSettings = config): {
  baseToken: MemoryToken;
  quoteTokens: MemoryToken[];
} {
  const baseToken = new MemoryToken({
    address: settings.baseToken.address,
    decimals: settings.baseToken.decimals,
    initialSupply: settings.baseToken.supply,
    holder: settings.depositoryAccount,
  });
  const quoteTokens = settings.quoteTokens.map((q) => {
    const token = new MemoryToken({ address: q.address, decimals: q.decimals });
    for (const { account, amount } of settings.devBalances) {
      token.mint(account, amount);
      token.approve(account, settings.depositoryAccount, amount);
    }
    return token;
  });
  return { baseToken, quoteTokens };
}

export async function createDevDepository(
  logger: DepositoryLogger,
  clock: Clock,
): Promise<BondDepository> {
  const { baseToken, quoteTokens } = createDevTokens();

  return BondDepository.create({
    baseToken,
    quoteTokens: new TokenRegistry(quoteTokens),
    clock,
    admin: new SingleAdministrator(config.adminPubkey),
    account: config.depositoryAccount,
    treasury: config.treasuryAccount,
    dao: config.daoAccount,
    refReward: config.refRewardBps,
    daoReward: config.daoRewardBps,
    logger,
  });
}

export async function buildApp(deps?: DepositoryDeps) {
  const app = Fastify({ logger: { level: deps?.logLevel ?? config.logLevel } });
  const clock = deps?.clock ?? systemClock;
  const depository = deps?.depository ?? (await createDevDepository(app.log, clock));

  const maxAgeSec = deps?.signatureMaxAgeSec ?? config.signatureMaxAgeSec;
  const ctx: RouteContext = {
    depository,
    clock,
    maxAgeSec,
    replay: new ReplayGuard(maxAgeSec),
  };

  app.setErrorHandler<FastifyError>((err, request, reply) => {
    if (isBondError(err)) {
      const status = statusFor(err.code);
      if (status >= 500) request.log.warn({ code: err.code, op: err.op }, err.reason);
      return reply.status(status).send({ error: err.code, detail: err.reason });
    }
    if (err.validation) {
      return reply.status(400).send({ error: INVALID_REQUEST, detail: err.message });
    }
    request.log.error({ err }, "unhandled error");
    return reply.status(err.statusCode ?? 500).send({ error: "internal_error", detail: err.message });
  });

  healthRoutes(app, ctx);
  marketRoutes(app, ctx);
  noteRoutes(app, ctx);
  rewardRoutes(app, ctx);
  eventRoutes(app, ctx);

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── depository config ───");
  console.log(`  port:              ${config.port}`);
  console.log(`  admin:             ${config.adminPubkey ? config.adminPubkey.slice(0, 12) + "…" : "(none)"}`);
  console.log(`  account:           ${config.depositoryAccount.slice(0, 12)}…`);
  console.log(`  treasury:          ${config.treasuryAccount.slice(0, 12)}…`);
  console.log(`  dao:               ${config.daoAccount.slice(0, 12)}…`);
  console.log(`  rewards (bps):     ref=${config.refRewardBps} dao=${config.daoRewardBps}`);
  console.log(`  base token:        ${config.baseToken.address.slice(0, 12)}… (${config.baseToken.decimals} dp)`);
  console.log(`  quote tokens:      ${config.quoteTokens.length > 0 ? config.quoteTokens.map((q) => q.address.slice(0, 12) + "…").join(", ") : "(none)"}`);
  console.log(`  dev balances:      ${config.devBalances.length > 0 ? config.devBalances.map((b) => `${b.account.slice(0, 12)}…=${b.amount}`).join(", ") : "(none; quote balances start empty)"}`);
  console.log(`  signature window:  ${config.signatureMaxAgeSec}s`);
  console.log("──────────────────────────");

  const app = await buildApp();

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
