import { z } from "zod";

export const DecisionOutcomeSchema = z.enum(["allowed", "denied"]);
export type DecisionOutcome = z.infer<typeof DecisionOutcomeSchema>;

export const AllowedDecisionSchema = z.object({
  outcome: z.literal("allowed"),
  limit: z.number().int().positive(),
  remaining: z.number().int().nonnegative(),
  resetAt: z.number(),
});
export type AllowedDecision = z.infer<typeof AllowedDecisionSchema>;

export const DeniedDecisionSchema = z.object({
  outcome: z.literal("denied"),
  limit: z.number().int().positive(),
  remaining: z.literal(0),
  resetAt: z.number(),
  retryAfterMs: z.number().nonnegative(),
});
export type DeniedDecision = z.infer<typeof DeniedDecisionSchema>;

export const DecisionSchema = z.discriminatedUnion("outcome", [
  AllowedDecisionSchema,
  DeniedDecisionSchema,
]);
export type Decision = z.infer<typeof DecisionSchema>;
