import type { FastifyPluginAsync } from "fastify";

export const greetingRoutes: FastifyPluginAsync = async (app) => {
  // GET / - gated by the admission controller
  app.get("/", {
    config: { admission: true },
    schema: {
      description: "Greeting endpoint, limited per client by the admission controller.",
      tags: ["Greeting"],
    },
  }, async (_request, reply) => {
    return reply.code(200).send({ message: "Hello, world!" });
  });
};
