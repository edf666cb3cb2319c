/**
 * Front-end reward routes + administrator settings.
 *
 * GET  /rewards/:account   — accrued, unclaimed rewards
 * POST /rewards/claim      — pay the signer's rewards (signed)
 * POST /admin/rewards      — set ref/dao basis points (signed, administrator)
 * POST /admin/whitelist    — whitelist a referrer (signed, administrator)
 * POST /admin/treasury     — set the quote-token treasury (signed, administrator)
 * POST /admin/dao          — set the DAO account (signed, administrator)
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import {
  SignedClaimRewards,
  SignedSetAccount,
  SignedSetRewards,
  SignedWhitelist,
} from "@curvebond/primitives";
import { signatureProblem } from "../signed.js";
import { Hex32, INVALID_REQUEST, type RouteContext } from "./context.js";

const AccountParams = Type.Object({ account: Hex32 });
type AccountParams = Static<typeof AccountParams>;

export function rewardRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { depository } = ctx;

  app.get<{ Params: AccountParams }>(
    "/rewards/:account",
    { schema: { params: AccountParams } },
    async (request, reply) => {
      const { account } = request.params;
      const rewards = await depository.rewardsFor(account);
      return reply.send({ account, rewards: rewards.toString() });
    },
  );

  app.post<{ Body: SignedClaimRewards }>(
    "/rewards/claim",
    { schema: { body: SignedClaimRewards } },
    async (request, reply) => {
      const problem = signatureProblem(request.body, ctx);
      if (problem) return reply.status(problem.status).send({ error: problem.error, detail: problem.detail });

      const { signer } = request.body;
      const amount = await depository.claimRewards(signer);
      return reply.send({ account: signer, amount: amount.toString() });
    },
  );

  // ── Administrator ───────────────────────────────────────────────

  app.post<{ Body: SignedSetRewards }>(
    "/admin/rewards",
    { schema: { body: SignedSetRewards } },
    async (request, reply) => {
      const problem = signatureProblem(request.body, ctx);
      if (problem) return reply.status(problem.status).send({ error: problem.error, detail: problem.detail });

      const { ref_reward, dao_reward } = request.body.payload;
      await depository.setRewards(request.body.signer, BigInt(ref_reward), BigInt(dao_reward));
      return reply.send({ ref_reward, dao_reward });
    },
  );

  app.post<{ Body: SignedWhitelist }>(
    "/admin/whitelist",
    { schema: { body: SignedWhitelist } },
    async (request, reply) => {
      const problem = signatureProblem(request.body, ctx);
      if (problem) return reply.status(problem.status).send({ error: problem.error, detail: problem.detail });

      const { referrer } = request.body.payload;
      await depository.whitelist(request.body.signer, referrer);
      return reply.send({ referrer, whitelisted: true });
    },
  );

  for (const setting of ["treasury", "dao"] as const) {
    app.post<{ Body: SignedSetAccount }>(
      `/admin/${setting}`,
      { schema: { body: SignedSetAccount } },
      async (request, reply) => {
        const { action, account } = request.body.payload;
        if (action !== `admin.${setting}`) {
          return reply.status(400).send({ error: INVALID_REQUEST, detail: `action must be admin.${setting}` });
        }

        const problem = signatureProblem(request.body, ctx);
        if (problem) return reply.status(problem.status).send({ error: problem.error, detail: problem.detail });

        if (setting === "treasury") await depository.setTreasury(request.body.signer, account);
        else await depository.setDao(request.body.signer, account);
        return reply.send({ [setting]: account });
      },
    );
  }
}
