import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { requireServiceAuth } from "../auth.js";
import type { ServiceContext } from "../context.js";
import { credentialView } from "../views.js";

const storeSchema = z.object({
  hash: z.string().regex(/^[0-9a-fA-F]{64}$/)
});

const handleParamsSchema = z.object({
  handle: z.string().min(1).max(128)
});

export const registerCredentialRoutes = (app: FastifyInstance, context: ServiceContext) => {
  const { config, program, log, metrics } = context;

  app.post("/v1/credentials", async (request, reply) => {
    const caller = await requireServiceAuth(context, request, reply, {
      requiredScopes: ["credential:write"]
    });
    if (!caller) return reply;
    const body = storeSchema.parse(request.body);
    const record = await program.storeCredential(
      config.PROGRAM_STATE_HANDLE,
      new Uint8Array(Buffer.from(body.hash, "hex")),
      caller.identity
    );
    metrics.incCounter("bridge_credentials_total", { op: "store" });
    log.info("credential.store", { requestId: request.id, handle: record.handle });
    return reply.code(201).send(credentialView(record));
  });

  app.post("/v1/credentials/:handle/revoke", async (request, reply) => {
    const caller = await requireServiceAuth(context, request, reply, {
      requiredScopes: ["credential:write"]
    });
    if (!caller) return reply;
    const { handle } = handleParamsSchema.parse(request.params);
    const record = await program.revokeCredential(handle, caller.identity);
    metrics.incCounter("bridge_credentials_total", { op: "revoke" });
    log.info("credential.revoke", { requestId: request.id, handle });
    return reply.send(credentialView(record));
  });

  app.get("/v1/credentials/:handle", async (request, reply) => {
    const caller = await requireServiceAuth(context, request, reply, {
      requiredScopes: ["credential:read"]
    });
    if (!caller) return reply;
    const { handle } = handleParamsSchema.parse(request.params);
    return reply.send(credentialView(await program.getCredential(handle)));
  });
};
