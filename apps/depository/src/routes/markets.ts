/**
 * Market routes.
 *
 * GET  /markets               — live market ids (optionally for one quote token)
 * GET  /markets/:id           — records plus price, debt, ratio, decay, control variable
 * GET  /markets/:id/quote     — payout for ?amount= quote units at the current price
 * POST /markets               — create a market (signed, administrator)
 * POST /markets/:id/close     — conclude a market now (signed, administrator)
 * POST /markets/:id/deposit   — buy a bond (signed, buyer)
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import {
  SignedCloseMarket,
  SignedCreateMarket,
  SignedDeposit,
  parseAmount,
} from "@curvebond/primitives";
import { signatureProblem } from "../signed.js";
import { Hex32, INVALID_REQUEST, type RouteContext } from "./context.js";

const MarketIdParams = Type.Object({ id: Type.Integer({ minimum: 0 }) });
type MarketIdParams = Static<typeof MarketIdParams>;

const MarketsQuery = Type.Object({ quote_token: Type.Optional(Hex32) });
type MarketsQuery = Static<typeof MarketsQuery>;

const QuoteQuery = Type.Object({ amount: Type.String({ pattern: "^[0-9]+$" }) });
type QuoteQuery = Static<typeof QuoteQuery>;

export function marketRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { depository } = ctx;

  app.get<{ Querystring: MarketsQuery }>(
    "/markets",
    { schema: { querystring: MarketsQuery } },
    async (request, reply) => {
      const { quote_token } = request.query;
      const markets = quote_token
        ? await depository.liveMarketsFor(quote_token)
        : await depository.liveMarkets();
      return reply.send({ markets });
    },
  );

  app.get<{ Params: MarketIdParams }>(
    "/markets/:id",
    { schema: { params: MarketIdParams } },
    async (request, reply) => {
      return reply.send(await depository.marketSummary(request.params.id));
    },
  );

  app.get<{ Params: MarketIdParams; Querystring: QuoteQuery }>(
    "/markets/:id/quote",
    { schema: { params: MarketIdParams, querystring: QuoteQuery } },
    async (request, reply) => {
      const { id } = request.params;
      const amount = parseAmount(request.query.amount, "amount");
      const [price, payout] = await Promise.all([
        depository.marketPrice(id),
        depository.payoutFor(amount, id),
      ]);
      return reply.send({
        market_id: id,
        amount: amount.toString(),
        price: price.toString(),
        payout: payout.toString(),
      });
    },
  );

  // ── Signed ──────────────────────────────────────────────────────

  app.post<{ Body: SignedCreateMarket }>(
    "/markets",
    { schema: { body: SignedCreateMarket } },
    async (request, reply) => {
      const problem = signatureProblem(request.body, ctx);
      if (problem) return reply.status(problem.status).send({ error: problem.error, detail: problem.detail });

      const p = request.body.payload;
      const marketId = await depository.createMarket(request.body.signer, {
        quoteToken: p.quote_token,
        capacity: parseAmount(p.capacity, "capacity"),
        initialPrice: parseAmount(p.initial_price, "initial_price"),
        debtBuffer: BigInt(p.debt_buffer),
        capacityInQuote: p.capacity_in_quote,
        fixedTerm: p.fixed_term,
        vesting: p.vesting,
        conclusion: p.conclusion,
        depositInterval: p.deposit_interval,
        tuneInterval: p.tune_interval,
      });
      return reply.send({ market_id: marketId });
    },
  );

  app.post<{ Params: MarketIdParams; Body: SignedCloseMarket }>(
    "/markets/:id/close",
    { schema: { params: MarketIdParams, body: SignedCloseMarket } },
    async (request, reply) => {
      const { id } = request.params;
      if (request.body.payload.market_id !== id) {
        return reply.status(400).send({ error: INVALID_REQUEST, detail: "market_id does not match route" });
      }

      const problem = signatureProblem(request.body, ctx);
      if (problem) return reply.status(problem.status).send({ error: problem.error, detail: problem.detail });
      await depository.closeMarket(request.body.signer, id);
      return reply.send({ market_id: id, closed: true });
    },
  );

  app.post<{ Params: MarketIdParams; Body: SignedDeposit }>(
    "/markets/:id/deposit",
    { schema: { params: MarketIdParams, body: SignedDeposit } },
    async (request, reply) => {
      const { id } = request.params;
      const p = request.body.payload;
      if (p.market_id !== id) {
        return reply.status(400).send({ error: INVALID_REQUEST, detail: "market_id does not match route" });
      }

      const problem = signatureProblem(request.body, ctx);
      if (problem) return reply.status(problem.status).send({ error: problem.error, detail: problem.detail });

      const result = await depository.deposit(request.body.signer, {
        marketId: id,
        amount: parseAmount(p.amount, "amount"),
        maxPrice: parseAmount(p.max_price, "max_price"),
        recipient: p.recipient,
        referrer: p.referrer,
      });
      return reply.send({
        market_id: id,
        payout: result.payout.toString(),
        matured: result.matured,
        index: result.index,
      });
    },
  );
}
