/**
 * GET /health — basic liveness check
 */

import type { FastifyInstance } from "fastify";
import type { RouteContext } from "./context.js";

export function healthRoutes(app: FastifyInstance, ctx: RouteContext): void {
  app.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      timestamp: ctx.clock.now(),
      markets: await ctx.depository.marketCount(),
    });
  });
}
