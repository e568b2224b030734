import Fastify from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import {
  FixedWindowRateLimiter,
  createAuthGate,
  createRateLimitGate,
  createRequestPipeline,
  createInMemoryItemStore,
  seedDefaultItems,
  API_KEY_HEADER,
} from "@itemgate/core";
import type { ItemStore, RequestPipeline } from "@itemgate/core";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { loggerOptions } from "./logger.js";
import { gatesMiddleware } from "./middleware/gates.js";
import { healthRoutes } from "./routes/health.js";
import { itemsRoutes } from "./routes/items.js";
import { toErrorResponse } from "./utils/error-response.js";

declare module "fastify" {
  interface FastifyInstance {
    itemStore: ItemStore;
    rateLimiter: FixedWindowRateLimiter;
    requestPipeline: RequestPipeline;
  }
}

export interface BuildServerOptions {
  /** Defaults to `loadConfig()` over `process.env`. */
  config?: AppConfig;
  /** Pass `false` to silence request logging. */
  logger?: boolean;
  /** Clock for the rate limiter, in epoch ms. */
  now?: () => number;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: options.logger === false ? false : loggerOptions(config.logLevel),
  });

  // CORS: any origin unless CORS_ORIGIN narrows it
  await app.register(cors, {
    origin: config.corsOrigin,
  });

  // OpenAPI documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: "itemgate API",
        description: "Versioned item CRUD behind an API key and a shared request quota",
        version: "0.1.0",
      },
      tags: [
        { name: "Items", description: "Create, read, replace and delete items" },
        { name: "Health", description: "Liveness" },
      ],
      components: {
        securitySchemes: {
          apiKey: {
            type: "apiKey",
            in: "header",
            name: API_KEY_HEADER,
            description: "Static API key. Set API_KEY to enable access to /v1.",
          },
        },
      },
    },
  });
  await app.register(swaggerUi, {
    routePrefix: "/docs",
  });

  // Global error handler: one error shape, no stack leaks
  app.setErrorHandler((error: Error, request, reply) => {
    const body = toErrorResponse(error);
    if (body.statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    }
    return reply.code(body.statusCode).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.code(404).send({ error: `Route ${request.method} ${request.url.split("?")[0]} not found`, statusCode: 404 });
  });

  const itemStore = createInMemoryItemStore();
  if (config.seedItems) {
    seedDefaultItems(itemStore);
  }

  const rateLimiter = new FixedWindowRateLimiter({
    windowMs: config.rateLimit.windowMs,
    permitLimit: config.rateLimit.permitLimit,
    now: options.now,
  });

  const requestPipeline = createRequestPipeline({
    authGate: createAuthGate({ secret: config.apiKey }),
    rateLimitGate: createRateLimitGate({ limiter: rateLimiter }),
  });

  if (!config.apiKey) {
    app.log.warn("API_KEY is not set: every /v1 request will be rejected with 401");
  }

  app.decorate("itemStore", itemStore);
  app.decorate("rateLimiter", rateLimiter);
  app.decorate("requestPipeline", requestPipeline);

  await app.register(gatesMiddleware, { pipeline: requestPipeline });

  await app.register(healthRoutes);
  await app.register(itemsRoutes, { prefix: "/v1/items" });

  return app;
}
