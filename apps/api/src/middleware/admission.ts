import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import type { AdmissionController } from "@turnstile/core";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Gate this route through the admission controller. */
    admission?: boolean;
  }
}

export interface AdmissionPluginOptions {
  controller: AdmissionController;
  /** Time source for decisions. Defaults to Date.now. */
  now?: () => number;
}

/**
 * Per-client admission control for routes registered with
 * `config: { admission: true }`, keyed by `request.ip` (the forwarded
 * address when trustProxy is on). Denied requests are answered with 429
 * before the route handler runs.
 */
const admissionPlugin: FastifyPluginAsync<AdmissionPluginOptions> = async (app, opts) => {
  const { controller, now = Date.now } = opts;

  app.addHook("onRequest", async (request, reply) => {
    if (request.routeOptions.config.admission !== true) return;

    const key = request.ip;
    const at = now();
    const decision = controller.check(key, at);

    reply.header("x-ratelimit-limit", String(decision.limit));
    reply.header("x-ratelimit-remaining", String(decision.remaining));
    reply.header("x-ratelimit-reset", String(Math.max(0, Math.ceil((decision.resetAt - at) / 1000))));

    if (decision.outcome === "denied") {
      request.log.info({ key, retryAfterMs: decision.retryAfterMs }, "Request denied by admission control");
      reply.header("retry-after", String(Math.ceil(decision.retryAfterMs / 1000)));
      return reply.code(429).send({ error: "Too many requests" });
    }
  });
};

export const admissionMiddleware = fp(admissionPlugin, { name: "admission-middleware" });
