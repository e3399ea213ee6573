import { z } from "zod";

export const ClientKeySchema = z.string().min(1).max(500);
export type ClientKey = z.infer<typeof ClientKeySchema>;

export const LimitPolicySchema = z.object({
  maxRequests: z.number().int().positive(),
  windowMs: z.number().int().positive(),
});
export type LimitPolicy = z.infer<typeof LimitPolicySchema>;

export const ClientStateSchema = z.object({
  count: z.number().int().nonnegative(),
  windowStart: z.number(),
  lastSeen: z.number(),
  denied: z.number().int().nonnegative(),
});
export type ClientState = z.infer<typeof ClientStateSchema>;
