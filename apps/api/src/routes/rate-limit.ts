import type { FastifyPluginAsync } from "fastify";
import { InvalidPolicyError } from "@turnstile/core";
import { formatRate, parseRate } from "@turnstile/schemas";
import type { LimitPolicy } from "@turnstile/schemas";
import { zodToJsonSchema } from "zod-to-json-schema";
import { ClientKeyParamsSchema, UpdateRateLimitBodySchema } from "../validation.js";
import type { UpdateRateLimitBody } from "../validation.js";

const updateRateLimitJsonSchema = zodToJsonSchema(UpdateRateLimitBodySchema, { target: "openApi3" });

function nextPolicy(current: LimitPolicy, body: UpdateRateLimitBody): LimitPolicy | null {
  if (body.rate !== undefined) {
    return parseRate(body.rate);
  }
  return {
    maxRequests: body.limit ?? current.maxRequests,
    windowMs: body.windowMs ?? current.windowMs,
  };
}

export const rateLimitRoutes: FastifyPluginAsync = async (app) => {
  // GET /api/rate-limit
  app.get("/", {
    schema: {
      description: "Read the active admission policy.",
      tags: ["Rate Limit"],
    },
  }, async (_request, reply) => {
    const policy = app.admission.currentLimit();
    return reply.code(200).send({
      limit: policy.maxRequests,
      windowMs: policy.windowMs,
      rate: formatRate(policy),
      trackedClients: app.admission.size,
    });
  });

  // POST /api/rate-limit
  app.post("/", {
    schema: {
      description: "Replace the admission policy. Fields left out keep their current value.",
      tags: ["Rate Limit"],
      body: updateRateLimitJsonSchema,
    },
    // The JSON schema only documents the body. ajv would coerce and strip
    // fields before UpdateRateLimitBodySchema sees them.
    validatorCompiler: () => () => true,
  }, async (request, reply) => {
    const parsed = UpdateRateLimitBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid request body", details: parsed.error.issues });
    }

    const previous = app.admission.isConfigured() ? app.admission.currentLimit() : null;
    const candidate = nextPolicy(previous ?? { maxRequests: 0, windowMs: 0 }, parsed.data);
    if (!candidate) {
      return reply.code(400).send({
        error: "Invalid rate limit policy",
        details: [`rate: "${parsed.data.rate ?? ""}" is not a rate such as "10 per minute"`],
      });
    }

    try {
      const policy = app.admission.configure(candidate);
      request.log.info({ previous, policy }, "Admission policy updated");
      return reply.code(200).send({ message: "Rate limit successfully updated!", policy });
    } catch (err) {
      if (err instanceof InvalidPolicyError) {
        return reply.code(400).send({ error: "Invalid rate limit policy", details: err.issues });
      }
      throw err;
    }
  });

  // DELETE /api/rate-limit/clients/:key
  app.delete("/clients/:key", {
    schema: {
      description: "Forget the counters recorded for one client.",
      tags: ["Rate Limit"],
      params: { type: "object", properties: { key: { type: "string" } }, required: ["key"] },
    },
  }, async (request, reply) => {
    const parsed = ClientKeyParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid client key", details: parsed.error.issues });
    }

    const { key } = parsed.data;
    if (!app.admission.reset(key)) {
      return reply.code(404).send({ error: "Client not found" });
    }
    return reply.code(200).send({ key, reset: true });
  });
};
