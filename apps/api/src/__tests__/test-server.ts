import type { FastifyInstance } from "fastify";
import { AdmissionController, createInMemoryMetrics } from "@turnstile/core";
import type { AdmissionMetrics } from "@turnstile/core";
import type { LimitPolicy } from "@turnstile/schemas";
import { buildServer } from "../app.js";
import { loadConfig } from "../config.js";

export interface TestContext {
  app: FastifyInstance;
  controller: AdmissionController;
  metrics: AdmissionMetrics;
  clock: TestClock;
}

export interface TestClock {
  now: () => number;
  advance: (ms: number) => void;
}

export interface TestServerOptions {
  /** Admission policy; omit with `unconfigured` to start without one. */
  policy?: LimitPolicy;
  unconfigured?: boolean;
  env?: NodeJS.ProcessEnv;
}

export function createTestClock(start = 1_000_000): TestClock {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export async function buildTestServer(options: TestServerOptions = {}): Promise<TestContext> {
  const clock = createTestClock();
  const metrics = createInMemoryMetrics();
  const controller = new AdmissionController({
    policy: options.unconfigured ? undefined : options.policy ?? { maxRequests: 10, windowMs: 60_000 },
    clock: clock.now,
    metrics,
  });

  const app = await buildServer({
    config: loadConfig(options.env ?? {}),
    controller,
    now: clock.now,
    logger: false,
    sweep: false,
  });

  return { app, controller, metrics, clock };
}
