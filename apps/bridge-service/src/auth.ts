import type { FastifyReply, FastifyRequest } from "fastify";
import {
  extractBearerToken,
  isIdentityKey,
  makeErrorResponse,
  verifyServiceJwt,
  type IdentityKey
} from "@idbridge/shared";
import type { ServiceContext } from "./context.js";

export type AuthenticatedCaller = {
  identity: IdentityKey;
  scopes: string[];
};

/**
 * Checks the relayer's service token and returns the calling identity (the
 * token subject). On failure the reply is already sent and `null` comes back.
 */
export const requireServiceAuth = async (
  context: ServiceContext,
  request: FastifyRequest,
  reply: FastifyReply,
  options: { requiredScopes: string[] }
): Promise<AuthenticatedCaller | null> => {
  const { config, log } = context;
  if (!config.SERVICE_JWT_SECRET) {
    await reply.code(503).send(
      makeErrorResponse("service_auth_not_configured", "Service authentication is not configured", {
        devMode: config.DEV_MODE
      })
    );
    return null;
  }
  const token = extractBearerToken(request.headers.authorization);
  if (!token) {
    await reply.code(401).send(
      makeErrorResponse("invalid_request", "Missing service token", {
        devMode: config.DEV_MODE
      })
    );
    return null;
  }
  try {
    const caller = await verifyServiceJwt(token, {
      audience: config.SERVICE_JWT_AUDIENCE,
      issuer: config.SERVICE_JWT_ISSUER,
      secret: config.SERVICE_JWT_SECRET,
      requiredScopes: options.requiredScopes
    });
    if (!isIdentityKey(caller.subject)) {
      await reply.code(401).send(
        makeErrorResponse("invalid_request", "Service token subject is not an identity key", {
          devMode: config.DEV_MODE
        })
      );
      return null;
    }
    log.info("service.auth.ok", {
      requestId: request.id,
      caller: caller.subject,
      scope: caller.scopes
    });
    return { identity: caller.subject, scopes: caller.scopes };
  } catch (error) {
    if (error instanceof Error && error.message === "jwt_missing_required_scope") {
      await reply.code(403).send(
        makeErrorResponse("service_auth_scope_missing", "Service token scope missing", {
          devMode: config.DEV_MODE
        })
      );
      return null;
    }
    log.warn("service.auth.rejected", { requestId: request.id, error });
    await reply.code(401).send(
      makeErrorResponse("invalid_request", "Invalid service token", {
        devMode: config.DEV_MODE
      })
    );
    return null;
  }
};
