import { z } from "zod";
import { parseRate } from "@turnstile/schemas";
import type { LimitPolicy } from "@turnstile/schemas";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const rateFromEnv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((raw, ctx): LimitPolicy => {
      const policy = parseRate(raw);
      if (!policy) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${raw}" is not a rate such as "10 per minute"` });
        return z.NEVER;
      }
      return policy;
    });

const EnvSchema = z.object({
  PORT: intFromEnv(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CORS_ORIGIN: z.string().optional(),
  TRUST_PROXY: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((v) => v === "true" || v === "1"),
  ADMISSION_MAX_REQUESTS: intFromEnv(10),
  ADMISSION_WINDOW_MS: intFromEnv(60_000),
  ADMISSION_RETENTION_MS: z.coerce.number().int().positive().optional(),
  ADMISSION_SWEEP_INTERVAL_MS: intFromEnv(60_000),
  RESOURCE_ROUTE_LIMIT: rateFromEnv("10 per minute"),
  SHUTDOWN_TIMEOUT_MS: intFromEnv(30_000),
});

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  corsOrigins: string[] | null;
  trustProxy: boolean;
  admission: LimitPolicy;
  retentionMs: number | undefined;
  sweepIntervalMs: number;
  resourceRouteLimit: LimitPolicy;
  shutdownTimeoutMs: number;
}

/**
 * Read server configuration from the environment.
 * @throws Error listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Empty strings count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join("; ")}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGIN
      ? e.CORS_ORIGIN.split(",").map((o) => o.trim()).filter(Boolean)
      : null,
    trustProxy: e.TRUST_PROXY,
    admission: { maxRequests: e.ADMISSION_MAX_REQUESTS, windowMs: e.ADMISSION_WINDOW_MS },
    retentionMs: e.ADMISSION_RETENTION_MS,
    sweepIntervalMs: e.ADMISSION_SWEEP_INTERVAL_MS,
    resourceRouteLimit: e.RESOURCE_ROUTE_LIMIT,
    shutdownTimeoutMs: e.SHUTDOWN_TIMEOUT_MS,
  };
}
