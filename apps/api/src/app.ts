import Fastify from "fastify";
import type { FastifyError } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { AdmissionController, UnconfiguredError } from "@turnstile/core";
import { admissionMiddleware } from "./middleware/admission.js";
import { greetingRoutes } from "./routes/greeting.js";
import { rateLimitRoutes } from "./routes/rate-limit.js";
import { resourceRoutes } from "./routes/resource.js";
import { infoRoutes } from "./routes/info.js";
import { healthRoutes } from "./routes/health.js";
import { createPromMetrics, metricsRoute } from "./metrics.js";
import { startEvictionSweepJob } from "./jobs/eviction-sweep.js";
import { loadConfig } from "./config.js";
import type { ServerConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { sanitizeErrorMessage } from "./utils/error-sanitizer.js";

declare module "fastify" {
  interface FastifyInstance {
    admission: AdmissionController;
  }
}

export interface BuildServerOptions {
  config?: ServerConfig;
  /** Use an existing controller instead of building one from config. */
  controller?: AdmissionController;
  /** Time source for admission decisions. */
  now?: () => number;
  /** Disable Fastify's request logger (tests). */
  logger?: boolean;
  /** Skip the background eviction sweep (tests drive sweep() directly). */
  sweep?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
    trustProxy: config.trustProxy,
  });

  // CORS — restrict origins when configured, allow all otherwise
  await app.register(cors, {
    origin: config.corsOrigins ?? true,
  });

  // OpenAPI documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: "Turnstile API",
        description: "Per-client admission control and rate limiting",
        version: "0.1.0",
      },
      tags: [
        { name: "Greeting", description: "Endpoint gated by the admission controller" },
        { name: "Rate Limit", description: "Read and replace the admission policy" },
        { name: "Resource", description: "Endpoints limited by @fastify/rate-limit" },
        { name: "Info", description: "Request header echo" },
        { name: "Health", description: "Liveness" },
      ],
    },
  });
  await app.register(swaggerUi, {
    routePrefix: "/docs",
  });

  // Global error handler — consistent error format, no stack leaks
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    if (error instanceof UnconfiguredError) {
      return reply.code(503).send({ error: error.message, statusCode: 503 });
    }

    const statusCode = error.statusCode ?? 500;
    const message = sanitizeErrorMessage(error, statusCode);

    if (statusCode >= 500) {
      app.log.error(error);
    }

    return reply.code(statusCode).send({
      error: message,
      statusCode,
    });
  });

  // Admission controller — one instance per server, shared by all handlers
  let controller = options.controller;
  if (!controller) {
    controller = new AdmissionController({
      policy: config.admission,
      retentionMs: config.retentionMs,
      metrics: createPromMetrics(),
    });
  }
  app.decorate("admission", controller);

  if (options.sweep !== false) {
    const stopSweep = startEvictionSweepJob({
      controller,
      intervalMs: config.sweepIntervalMs,
      logger: createLogger("eviction-sweep", config.logLevel),
    });
    app.addHook("onClose", async () => {
      stopSweep();
    });
  }

  // Register middleware
  await app.register(admissionMiddleware, { controller, now: options.now });

  app.get("/metrics", { schema: { hide: true } }, metricsRoute);

  // Register routes
  await app.register(greetingRoutes);
  await app.register(healthRoutes, { prefix: "/health" });
  await app.register(rateLimitRoutes, { prefix: "/api/rate-limit" });
  await app.register(resourceRoutes, { prefix: "/api", routeLimit: config.resourceRouteLimit });
  await app.register(infoRoutes, { prefix: "/api" });

  return app;
}
