import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { isBridgeError } from "@idbridge/shared";
import { requireServiceAuth } from "../auth.js";
import type { ServiceContext } from "../context.js";
import { outcomeView } from "../views.js";

const receiveSchema = z.object({
  vaa: z
    .string()
    .min(1)
    .regex(/^[A-Za-z0-9+/]+={0,2}$/),
  recipient: z
    .string()
    .regex(/^\d+\.\d+\.\d+$/)
    .optional()
});

export const registerMessageRoutes = (app: FastifyInstance, context: ServiceContext) => {
  const { config, program, log, metrics } = context;

  app.post("/v1/messages", async (request, reply) => {
    const caller = await requireServiceAuth(context, request, reply, {
      requiredScopes: ["message:receive"]
    });
    if (!caller) return reply;
    const body = receiveSchema.parse(request.body);
    const raw = new Uint8Array(Buffer.from(body.vaa, "base64"));
    try {
      const outcome = await program.receiveMessage(raw, {
        state: config.PROGRAM_STATE_HANDLE,
        recipient: body.recipient
      });
      metrics.incCounter("bridge_messages_total", {
        type: outcome.messageType,
        outcome: "accepted"
      });
      log.info("message.accepted", {
        requestId: request.id,
        messageType: outcome.messageType,
        stage: outcome.stage
      });
      return reply.send(outcomeView(outcome));
    } catch (error) {
      metrics.incCounter("bridge_messages_total", {
        type: "unknown",
        outcome: isBridgeError(error) ? error.code : "failed"
      });
      throw error;
    }
  });
};
