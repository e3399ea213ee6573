import type { FastifyPluginAsync } from "fastify";
import rateLimit from "@fastify/rate-limit";
import type { LimitPolicy } from "@turnstile/schemas";

export interface ResourceRoutesOptions {
  /** Limit applied to GET /resource. */
  routeLimit: LimitPolicy;
}

/**
 * Routes limited by @fastify/rate-limit. The plugin is registered inside this
 * scope with `global: false`, so only routes that declare `config.rateLimit`
 * are counted.
 */
export const resourceRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (app, opts) => {
  await app.register(rateLimit, {
    global: false,
    errorResponseBuilder: () => ({
      statusCode: 429,
      error: "Too many requests",
      message: "Too many requests",
    }),
  });

  // GET /api/resource
  app.get("/resource", {
    config: {
      rateLimit: {
        max: opts.routeLimit.maxRequests,
        timeWindow: opts.routeLimit.windowMs,
      },
    },
    schema: {
      description: "Sample resource with its own per-route rate limit.",
      tags: ["Resource"],
    },
  }, async (_request, reply) => {
    return reply.code(200).send({ message: "Resource accessed successfully" });
  });
};
