import { describe, it, expect, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { InMemoryCounter } from "@turnstile/core";
import { buildTestServer, type TestContext } from "./test-server.js";

describe("Admission control on GET /", () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function setup(...args: Parameters<typeof buildTestServer>): Promise<TestContext> {
    const ctx = await buildTestServer(...args);
    app = ctx.app;
    return ctx;
  }

  it("should allow requests under the limit", async () => {
    const ctx = await setup({ policy: { maxRequests: 2, windowMs: 60_000 } });

    const res = await ctx.app.inject({ method: "GET", url: "/" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ message: "Hello, world!" });
    expect(res.headers["x-ratelimit-limit"]).toBe("2");
    expect(res.headers["x-ratelimit-remaining"]).toBe("1");
    expect(res.headers["x-ratelimit-reset"]).toBe("60");
  });

  it("should return 429 once the client exceeds the limit", async () => {
    const ctx = await setup({ policy: { maxRequests: 2, windowMs: 60_000 } });

    await ctx.app.inject({ method: "GET", url: "/" });
    await ctx.app.inject({ method: "GET", url: "/" });
    ctx.clock.advance(1_000);
    const res = await ctx.app.inject({ method: "GET", url: "/" });

    expect(res.statusCode).toBe(429);
    expect(res.json()).toEqual({ error: "Too many requests" });
    expect(res.headers["retry-after"]).toBe("59");
    expect(res.headers["x-ratelimit-remaining"]).toBe("0");
  });

  it("should admit the client again once the window has passed", async () => {
    const ctx = await setup({ policy: { maxRequests: 2, windowMs: 60_000 } });

    await ctx.app.inject({ method: "GET", url: "/" });
    ctx.clock.advance(1_000);
    await ctx.app.inject({ method: "GET", url: "/" });
    ctx.clock.advance(1_000);
    expect((await ctx.app.inject({ method: "GET", url: "/" })).statusCode).toBe(429);

    ctx.clock.advance(59_000);
    const res = await ctx.app.inject({ method: "GET", url: "/" });
    expect(res.statusCode).toBe(200);
  });

  it("should count each client address separately", async () => {
    const ctx = await setup({ policy: { maxRequests: 1, windowMs: 60_000 } });

    const first = await ctx.app.inject({ method: "GET", url: "/", remoteAddress: "203.0.113.1" });
    const repeat = await ctx.app.inject({ method: "GET", url: "/", remoteAddress: "203.0.113.1" });
    const other = await ctx.app.inject({ method: "GET", url: "/", remoteAddress: "203.0.113.2" });

    expect(first.statusCode).toBe(200);
    expect(repeat.statusCode).toBe(429);
    expect(other.statusCode).toBe(200);
    expect(ctx.controller.inspect("203.0.113.1")?.denied).toBe(1);
  });

  it("should key clients by X-Forwarded-For when TRUST_PROXY is enabled", async () => {
    const ctx = await setup({ policy: { maxRequests: 1, windowMs: 60_000 }, env: { TRUST_PROXY: "true" } });

    const a = await ctx.app.inject({ method: "GET", url: "/", headers: { "x-forwarded-for": "198.51.100.1" } });
    const b = await ctx.app.inject({ method: "GET", url: "/", headers: { "x-forwarded-for": "198.51.100.2" } });

    expect(a.statusCode).toBe(200);
    expect(b.statusCode).toBe(200);
    expect(ctx.controller.inspect("198.51.100.1")?.count).toBe(1);
    expect(ctx.controller.inspect("198.51.100.2")?.count).toBe(1);
  });

  it("should ignore X-Forwarded-For when TRUST_PROXY is off", async () => {
    const ctx = await setup({ policy: { maxRequests: 1, windowMs: 60_000 } });

    const a = await ctx.app.inject({
      method: "GET",
      url: "/",
      remoteAddress: "203.0.113.5",
      headers: { "x-forwarded-for": "198.51.100.1" },
    });
    const b = await ctx.app.inject({
      method: "GET",
      url: "/",
      remoteAddress: "203.0.113.5",
      headers: { "x-forwarded-for": "198.51.100.2" },
    });

    expect(a.statusCode).toBe(200);
    expect(b.statusCode).toBe(429);
    expect(ctx.controller.inspect("203.0.113.5")?.count).toBe(1);
    expect(ctx.controller.inspect("198.51.100.1")).toBeUndefined();
  });

  it("should admit exactly 10 of 1000 concurrent requests from one client", async () => {
    const ctx = await setup({ policy: { maxRequests: 10, windowMs: 60_000 } });

    const responses = await Promise.all(
      Array.from({ length: 1000 }, () => ctx.app.inject({ method: "GET", url: "/" })),
    );

    expect(responses.filter((r) => r.statusCode === 200)).toHaveLength(10);
    expect(responses.filter((r) => r.statusCode === 429)).toHaveLength(990);

    const decisions = ctx.metrics.decisionsTotal;
    expect(decisions).toBeInstanceOf(InMemoryCounter);
    if (decisions instanceof InMemoryCounter) {
      expect(decisions.get({ outcome: "allowed" })).toBe(10);
      expect(decisions.get({ outcome: "denied" })).toBe(990);
    }
  });

  it("should not gate routes that do not opt in", async () => {
    const ctx = await setup({ policy: { maxRequests: 1, windowMs: 60_000 } });

    await ctx.app.inject({ method: "GET", url: "/" });
    const health = await ctx.app.inject({ method: "GET", url: "/health" });
    const limit = await ctx.app.inject({ method: "GET", url: "/api/rate-limit" });

    expect(health.statusCode).toBe(200);
    expect(limit.statusCode).toBe(200);
    expect(ctx.controller.inspect("127.0.0.1")?.count).toBe(1);
  });

  it("should return 503 when no policy is configured", async () => {
    const ctx = await setup({ unconfigured: true });

    const res = await ctx.app.inject({ method: "GET", url: "/" });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ error: "Admission control is not configured", statusCode: 503 });
    expect(ctx.controller.size).toBe(0);
  });
});
