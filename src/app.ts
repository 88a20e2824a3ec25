import Fastify, { type FastifyInstance } from "fastify";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { SwaggerOptions } from "@fastify/swagger";
import type { FastifySwaggerUiOptions } from "@fastify/swagger-ui";
import { ZodError } from "zod";
import { AppError } from "./common/errors";
import { ContainerOptions, createContainer } from "./di";
import { registerLedgerRoutes } from "./modules/ledger/routes";
import { openapiDocument } from "./common/openapi";
import { config } from "./config";
import { closePool } from "./infra/postgres/pool";

export type BuildAppOptions = Omit<ContainerOptions, "logger">;

function clientErrorStatus(error: unknown): number | null {
  if (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return error.statusCode;
  }
  return null;
}

export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: { level: config.LOG_LEVEL },
    bodyLimit: config.BODY_LIMIT_BYTES
  });
  const container = createContainer({ ...options, logger: app.log });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true
    }
  });

  const swaggerOptions: SwaggerOptions = {
    mode: "static",
    specification: {
      document: openapiDocument
    }
  };

  const swaggerUiOptions: FastifySwaggerUiOptions = {
    routePrefix: "/docs",
    uiConfig: {
      docExpansion: "list",
      url: "/docs/json"
    }
  };

  app.register(swagger, swaggerOptions);
  app.register(swaggerUi, swaggerUiOptions);

  app.get("/health", async () => ({ status: "ok" }));

  app.get("/health/store", async () => {
    try {
      const start = Date.now();
      await container.ledgerController.checkStorage();
      return { status: "ok", latency: Date.now() - start };
    } catch (error) {
      app.log.error({ err: error }, "Ledger storage health check failed");
      return { status: "down" };
    }
  });

  registerLedgerRoutes(app, container.ledgerController);

  app.setErrorHandler((error: unknown, request, reply) => {
    if (error instanceof AppError) {
      if (error.status >= 500) {
        request.log.error({ err: error }, "Ledger request failed");
      }
      return reply
        .status(error.status)
        .send({ error: error.code, message: error.message });
    }

    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => ({
        path: issue.path.join("."),
        code: issue.code,
        message: issue.message
      }));

      const amountIssue = error.issues.find((issue) => issue.path.includes("amount"));
      if (amountIssue) {
        return reply.status(400).send({
          error: "INVALID_AMOUNT",
          message: "Amount must be a positive number with up to two decimals",
          details: issues
        });
      }

      return reply.status(400).send({
        error: "INVALID_REQUEST",
        message: "Validation failed",
        details: issues
      });
    }

    const status = clientErrorStatus(error);
    if (status !== null) {
      return reply.status(status).send({
        error: status === 429 ? "RATE_LIMITED" : "INVALID_REQUEST",
        message: error instanceof Error ? error.message : "Bad request"
      });
    }

    const err = error instanceof Error ? error : new Error("Unknown error");
    request.log.error({ err }, "Unhandled error");
    return reply.status(500).send({
      error: "INTERNAL_SERVER_ERROR",
      message: "Unexpected error"
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`
    });
  });

  app.addHook("onClose", async () => {
    if (!options.store && config.LEDGER_PROVIDER === "postgres") {
      await closePool();
    }
  });

  return app;
}
