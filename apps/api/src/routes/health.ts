import type { FastifyPluginAsync } from "fastify";

/**
 * Liveness and the root redirect. Neither route is behind the API key or the
 * rate limiter, so both answer even when the quota is spent.
 */
export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/health", {
    schema: {
      description: "Liveness check.",
      tags: ["Health"],
    },
  }, async () => ({ status: "OK" }));

  app.get("/", { schema: { hide: true } }, async (_request, reply) => {
    return reply.redirect(302, "/docs");
  });
};
