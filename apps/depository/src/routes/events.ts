/**
 * GET /events?since= — committed events from seq `since` (default 0), oldest first.
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import type { RouteContext } from "./context.js";

const EventsQuery = Type.Object({
  since: Type.Optional(Type.Integer({ minimum: 0 })),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000 })),
});
type EventsQuery = Static<typeof EventsQuery>;

export function eventRoutes(app: FastifyInstance, ctx: RouteContext): void {
  app.get<{ Querystring: EventsQuery }>(
    "/events",
    { schema: { querystring: EventsQuery } },
    async (request, reply) => {
      const { since = 0, limit = 100 } = request.query;
      const { events } = ctx.depository;
      return reply.send({
        events: events.since(since).slice(0, limit),
        count: events.count(),
        head: events.head(),
      });
    },
  );
}
