import fastify from "fastify";
import rateLimit from "@fastify/rate-limit";
import { randomUUID } from "node:crypto";
import { ZodError } from "zod";
import {
  httpStatusForBridgeError,
  isBridgeError,
  makeErrorResponse,
  type Logger,
  type MetricsRegistry
} from "@idbridge/shared";
import type { BridgeProgram } from "@idbridge/dispatch";
import type { AppConfig } from "./config.js";
import type { ServiceContext } from "./context.js";
import { log as serviceLog } from "./log.js";
import { metrics as serviceMetrics } from "./metrics.js";
import { registerCredentialRoutes } from "./routes/credentials.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerMessageRoutes } from "./routes/messages.js";
import { registerProgramRoutes } from "./routes/program.js";

export type ServerDeps = {
  config: AppConfig;
  program: BridgeProgram;
  log?: Logger;
  metrics?: MetricsRegistry;
};

const describeCode = (code: string) => code.replace(/_/g, " ");

export const buildServer = (deps: ServerDeps) => {
  const context: ServiceContext = {
    config: deps.config,
    program: deps.program,
    log: deps.log ?? serviceLog,
    metrics: deps.metrics ?? serviceMetrics
  };
  const { config, log, metrics } = context;
  if (!config.SERVICE_JWT_SECRET) {
    if (config.NODE_ENV === "production") {
      log.error("service.auth.missing", { env: config.NODE_ENV });
      throw new Error("service_auth_not_configured");
    }
    log.warn("service.auth.missing", { env: config.NODE_ENV });
  }

  const app = fastify({
    logger: false,
    trustProxy: config.TRUST_PROXY,
    bodyLimit: config.BODY_LIMIT_BYTES,
    requestIdHeader: "x-request-id",
    genReqId: () => randomUUID()
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("X-Request-Id", request.id);
    log.info("request", {
      requestId: request.id,
      method: request.method,
      url: request.url,
      auth: request.headers.authorization ? "present" : "missing"
    });
  });

  app.addHook("onResponse", async (request, reply) => {
    const route = request.routeOptions.url ?? request.url.split("?")[0];
    metrics.incCounter("requests_total", {
      route,
      method: request.method,
      status: String(reply.statusCode)
    });
  });

  app.setErrorHandler((error: Error, request, reply) => {
    if (isBridgeError(error)) {
      log.warn("request.rejected", {
        requestId: request.id,
        code: error.code,
        details: error.details
      });
      return reply.code(httpStatusForBridgeError(error)).send(
        makeErrorResponse(error.code, describeCode(error.code), {
          details: error.details,
          devMode: config.DEV_MODE
        })
      );
    }
    if (error instanceof ZodError || "validation" in error) {
      return reply.code(400).send(
        makeErrorResponse("invalid_request", "Invalid request", {
          details: error.message,
          devMode: config.DEV_MODE,
          debug: config.DEV_MODE ? { cause: error.message } : undefined
        })
      );
    }
    if ("statusCode" in error && error.statusCode === 429) {
      return reply.code(429).send(
        makeErrorResponse("rate_limited", "Too many requests", { devMode: config.DEV_MODE })
      );
    }
    log.error("request.failed", { requestId: request.id, error: error.message });
    return reply.code(500).send(
      makeErrorResponse("internal_error", "Internal error", {
        devMode: config.DEV_MODE,
        debug: config.DEV_MODE ? { cause: error.message } : undefined
      })
    );
  });

  app.register(rateLimit, { max: 120, timeWindow: "1 minute" });

  registerHealthRoutes(app, context);
  registerProgramRoutes(app, context);
  registerMessageRoutes(app, context);
  registerCredentialRoutes(app, context);

  return app;
};
