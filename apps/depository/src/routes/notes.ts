/**
 * Note routes.
 *
 * GET  /notes/:owner              — live notes + indexes still pending
 * GET  /notes/:owner/:index       — payout and whether it is redeemable now
 * POST /notes/:owner/redeem       — redeem matured notes (all pending when no indexes)
 * POST /notes/:owner/:index/push  — grant a transfer (signed, owner)
 * POST /notes/:owner/:index/pull  — take a granted note (signed, recipient)
 *
 * Redeem is unsigned: it only ever pays the owner.
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import { RedeemBody, SignedPullNote, SignedPushNote, noteToWire } from "@curvebond/primitives";
import { signatureProblem } from "../signed.js";
import { Hex32, INVALID_REQUEST, type RouteContext } from "./context.js";

const OwnerParams = Type.Object({ owner: Hex32 });
type OwnerParams = Static<typeof OwnerParams>;

const NoteParams = Type.Object({ owner: Hex32, index: Type.Integer({ minimum: 0 }) });
type NoteParams = Static<typeof NoteParams>;

export function noteRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { depository } = ctx;

  app.get<{ Params: OwnerParams }>(
    "/notes/:owner",
    { schema: { params: OwnerParams } },
    async (request, reply) => {
      const { owner } = request.params;
      const [notes, pending] = await Promise.all([
        depository.notesFor(owner),
        depository.indexesFor(owner),
      ]);
      return reply.send({
        owner,
        notes: notes.map(({ index, note }) => noteToWire(index, note)),
        pending,
      });
    },
  );

  app.get<{ Params: NoteParams }>(
    "/notes/:owner/:index",
    { schema: { params: NoteParams } },
    async (request, reply) => {
      const { owner, index } = request.params;
      const [note, pending] = await Promise.all([
        depository.note(owner, index),
        depository.pendingFor(owner, index),
      ]);
      return reply.send({
        ...noteToWire(index, note),
        pending: { payout: pending.payout.toString(), matured: pending.matured },
      });
    },
  );

  app.post<{ Params: OwnerParams; Body: RedeemBody }>(
    "/notes/:owner/redeem",
    { schema: { params: OwnerParams, body: RedeemBody } },
    async (request, reply) => {
      const { owner } = request.params;
      const { indexes } = request.body;
      const payout = indexes
        ? await depository.redeem(owner, indexes)
        : await depository.redeemAll(owner);
      return reply.send({ owner, payout: payout.toString() });
    },
  );

  // ── Signed transfers ────────────────────────────────────────────

  app.post<{ Params: NoteParams; Body: SignedPushNote }>(
    "/notes/:owner/:index/push",
    { schema: { params: NoteParams, body: SignedPushNote } },
    async (request, reply) => {
      const { owner, index } = request.params;
      const { signer, payload } = request.body;
      if (payload.index !== index) {
        return reply.status(400).send({ error: INVALID_REQUEST, detail: "index does not match route" });
      }

      const problem = signatureProblem(request.body, ctx);
      if (problem) return reply.status(problem.status).send({ error: problem.error, detail: problem.detail });

      if (signer !== owner) {
        return reply.status(403).send({ error: "Unauthorized", detail: "only the owner may push a note" });
      }

      await depository.pushNote(owner, index, payload.to);
      return reply.send({ owner, index, to: payload.to });
    },
  );

  app.post<{ Params: NoteParams; Body: SignedPullNote }>(
    "/notes/:owner/:index/pull",
    { schema: { params: NoteParams, body: SignedPullNote } },
    async (request, reply) => {
      const { owner, index } = request.params;
      const { signer, payload } = request.body;
      if (payload.from !== owner || payload.index !== index) {
        return reply.status(400).send({ error: INVALID_REQUEST, detail: "from/index do not match route" });
      }

      const problem = signatureProblem(request.body, ctx);
      if (problem) return reply.status(problem.status).send({ error: problem.error, detail: problem.detail });

      const newIndex = await depository.pullNote(signer, owner, index);
      return reply.send({ owner: signer, index: newIndex, from: owner });
    },
  );
}
