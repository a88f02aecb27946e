import type { FastifyInstance } from "fastify";
import { requireServiceAuth } from "../auth.js";
import type { ServiceContext } from "../context.js";
import { programStateView } from "../views.js";

export const registerProgramRoutes = (app: FastifyInstance, context: ServiceContext) => {
  const { config, program, log } = context;
  const state = config.PROGRAM_STATE_HANDLE;

  app.post("/v1/program/initialize", async (request, reply) => {
    const caller = await requireServiceAuth(context, request, reply, {
      requiredScopes: ["program:initialize"]
    });
    if (!caller) return reply;
    const account = await program.initialize(caller.identity, state);
    log.info("program.initialize", { requestId: request.id, state });
    return reply.code(201).send(programStateView(state, account));
  });

  app.get("/v1/program/state", async (request, reply) => {
    const caller = await requireServiceAuth(context, request, reply, {
      requiredScopes: ["program:read"]
    });
    if (!caller) return reply;
    return reply.send(programStateView(state, await program.getProgramState(state)));
  });
};
