import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import type { RequestPipeline } from "@itemgate/core";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Spend a rate-limit permit on every request to this route. */
    rateLimited?: boolean;
  }
}

export interface GatesMiddlewareOptions {
  pipeline: RequestPipeline;
}

/**
 * Runs the request pipeline (API key, then rate limit) before routing
 * reaches a handler. Registered with fastify-plugin so the hook covers every
 * route, including the not-found handler.
 *
 * A rejected request is answered here and never reaches the item store.
 * Rate-limit headers from an admitted request are copied onto its reply.
 */
const gatesPlugin: FastifyPluginAsync<GatesMiddlewareOptions> = async (app, opts) => {
  const { pipeline } = opts;

  app.addHook("onRequest", async (request, reply) => {
    // CORS preflight carries no credentials; @fastify/cors answers it.
    if (request.method === "OPTIONS") return;

    const result = pipeline.run({
      method: request.method,
      // The route the router matched, not the URL as sent: "/%761/items"
      // is served by "/v1/items".
      path: request.is404 ? request.url : request.routeOptions.url ?? request.url,
      headers: request.headers,
      rateLimited: request.routeOptions.config.rateLimited === true,
    });

    if (result.kind === "reject") {
      request.log.info(
        { reason: result.reason, statusCode: result.statusCode, url: request.url },
        "Request rejected by gate",
      );
      return reply
        .code(result.statusCode)
        .headers(result.headers)
        .send({ error: result.error, statusCode: result.statusCode });
    }

    reply.headers(result.headers);
  });
};

export const gatesMiddleware = fp(gatesPlugin, { name: "gates-middleware" });
