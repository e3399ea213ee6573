import type { FastifyPluginAsync } from "fastify";

function headerValue(value: string | string[] | undefined): string | null {
  if (value === undefined) return null;
  return Array.isArray(value) ? value.join(", ") : value;
}

export const infoRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/info - echoes the proxy and client headers seen by the server
  app.get("/info", {
    schema: {
      description: "Echo the connecting and proxy addresses, host and user agent. Not rate limited.",
      tags: ["Info"],
    },
  }, async (request, reply) => {
    return reply.code(200).send({
      connecting_ip: headerValue(request.headers["x-real-ip"]),
      proxy_ip: headerValue(request.headers["x-forwarded-for"]),
      host: headerValue(request.headers.host),
      "user-agent": headerValue(request.headers["user-agent"]),
    });
  });
};
