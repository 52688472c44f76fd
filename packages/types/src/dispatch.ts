import { z } from 'zod';

export const DispatchStrategySchema = z.enum([
  'first-arg-type',
  'all-positional-types',
  'all-keyword-types',
  'all-arg-types',
]);
export type DispatchStrategy = z.infer<typeof DispatchStrategySchema>;

export const DEFAULT_BACKEND = '_default';

export const BackendNameSchema = z.string().min(1);

/** Scalar part of a generic registration; implementations and contexts are checked by the engine. */
export const GenericOptionsSchema = z.object({
  name: z.string().min(1),
  dispatch: DispatchStrategySchema.default('first-arg-type'),
  pipeable: z.boolean().default(false),
  dependent: z.boolean().default(false),
  arity: z.number().int().nonnegative().optional(),
  verbArgOnly: z.boolean().default(false),
}).refine((o) => !o.dependent || o.pipeable, {
  message: 'dependent callables must be pipeable',
  path: ['dependent'],
}).refine((o) => !o.verbArgOnly || !o.pipeable, {
  message: 'verbArgOnly applies to plain functions only',
  path: ['verbArgOnly'],
});
export type GenericOptions = z.infer<typeof GenericOptionsSchema>;
export type GenericOptionsInput = z.input<typeof GenericOptionsSchema>;

export const DispatchEntrySummarySchema = z.object({
  type: z.string(),
  backend: z.string(),
  favored: z.boolean(),
  order: z.number().int().nonnegative(),
});
export type DispatchEntrySummary = z.infer<typeof DispatchEntrySummarySchema>;
