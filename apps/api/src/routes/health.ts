import type { FastifyPluginAsync } from "fastify";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  // GET /health - liveness plus admission controller state
  app.get("/", {
    schema: {
      description: "Liveness check.",
      tags: ["Health"],
    },
  }, async (_request, reply) => {
    return reply.code(200).send({
      status: "ok",
      admission: app.admission.isConfigured() ? "configured" : "unconfigured",
      timestamp: new Date().toISOString(),
    });
  });
};
