import type { FastifyInstance } from "fastify";
import type { ServiceContext } from "../context.js";

export const registerHealthRoutes = (app: FastifyInstance, context: ServiceContext) => {
  app.get("/healthz", async () => ({ ok: true }));
  app.get("/metrics", async (_request, reply) => {
    reply.header("content-type", "text/plain; version=0.0.4");
    return reply.send(context.metrics.render());
  });
};
