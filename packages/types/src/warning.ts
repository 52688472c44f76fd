import { z } from 'zod';

// --- Warning ---

export const RuntimeWarningCodeSchema = z.enum([
  'AMBIGUOUS_DISPATCH',
  'CALL_MODE_UNDETERMINED',
]);
export type RuntimeWarningCode = z.infer<typeof RuntimeWarningCodeSchema>;

export const RuntimeWarningSchema = z.object({
  code: RuntimeWarningCodeSchema,
  message: z.string(),
  location: z.string().optional(),
});
export type RuntimeWarning = z.infer<typeof RuntimeWarningSchema>;

// --- Expression inspection ---

export const ExpressionInspectionSchema = z.object({
  valid: z.boolean(),
  errors: z.array(z.object({
    path: z.string(),
    error: z.string(),
  })),
  references: z.array(z.string()),
  callables_used: z.array(z.string()),
  has_piping: z.boolean(),
  estimated_complexity: z.number(),
});
export type ExpressionInspection = z.infer<typeof ExpressionInspectionSchema>;
