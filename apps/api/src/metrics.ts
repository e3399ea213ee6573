import client from "prom-client";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { AdmissionMetrics, Counter } from "@turnstile/core";

const register = new client.Registry();
client.collectDefaultMetrics({ register });

class PromCounter implements Counter {
  private counter: client.Counter;
  constructor(name: string, help: string, labelNames: string[]) {
    this.counter = new client.Counter({ name, help, labelNames, registers: [register] });
  }
  inc(labels?: Record<string, string>, value?: number): void {
    if (labels) {
      this.counter.inc(labels, value ?? 1);
    } else {
      this.counter.inc(value ?? 1);
    }
  }
}

let promMetrics: AdmissionMetrics | null = null;

/** Counters are registered once per process; later calls share them. */
export function createPromMetrics(): AdmissionMetrics {
  if (!promMetrics) {
    promMetrics = {
      decisionsTotal: new PromCounter("turnstile_admission_decisions_total", "Admission decisions", ["outcome"]),
      evictionsTotal: new PromCounter("turnstile_admission_evictions_total", "Client entries evicted after inactivity", []),
    };
  }
  return promMetrics;
}

export async function metricsRoute(_request: FastifyRequest, reply: FastifyReply) {
  const metrics = await register.metrics();
  return reply.type(register.contentType).send(metrics);
}
