import { z } from 'zod';

// --- Call mode ---

export const CallModeSchema = z.enum(['piping', 'normal']);
export type CallMode = z.infer<typeof CallModeSchema>;

export const FallbackPolicySchema = z.enum([
  'piping',
  'normal',
  'piping-with-warning',
  'normal-with-warning',
  'raise',
]);
export type FallbackPolicy = z.infer<typeof FallbackPolicySchema>;

export const PipingOperatorSchema = z.enum(['>>', '|', '//', '@', '%', '&', '^']);
export type PipingOperator = z.infer<typeof PipingOperatorSchema>;

// --- Runtime options ---

export const RuntimeOptionsSchema = z.object({
  astFallback: FallbackPolicySchema.default('normal-with-warning'),
  assumeAllPiping: z.boolean().default(false),
  pipingOperator: PipingOperatorSchema.default('>>'),
});
export type RuntimeOptions = z.infer<typeof RuntimeOptionsSchema>;
export type RuntimeOptionsInput = z.input<typeof RuntimeOptionsSchema>;

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

export const RuntimeEnvSchema = z.object({
  PIPESMITH_AST_FALLBACK: FallbackPolicySchema.optional(),
  PIPESMITH_ASSUME_ALL_PIPING: BooleanFlagSchema.optional(),
  PIPESMITH_PIPING_OPERATOR: PipingOperatorSchema.optional(),
});
export type RuntimeEnv = z.infer<typeof RuntimeEnvSchema>;
