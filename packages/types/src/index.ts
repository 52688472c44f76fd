export {
  CallModeSchema,
  FallbackPolicySchema,
  PipingOperatorSchema,
  RuntimeOptionsSchema,
  RuntimeEnvSchema,
} from './options.js';

export type {
  CallMode,
  FallbackPolicy,
  PipingOperator,
  RuntimeOptions,
  RuntimeOptionsInput,
  RuntimeEnv,
} from './options.js';

export {
  DispatchStrategySchema,
  BackendNameSchema,
  GenericOptionsSchema,
  DispatchEntrySummarySchema,
  DEFAULT_BACKEND,
} from './dispatch.js';

export type {
  DispatchStrategy,
  GenericOptions,
  GenericOptionsInput,
  DispatchEntrySummary,
} from './dispatch.js';

export {
  RuntimeWarningCodeSchema,
  RuntimeWarningSchema,
  ExpressionInspectionSchema,
} from './warning.js';

export type {
  RuntimeWarningCode,
  RuntimeWarning,
  ExpressionInspection,
} from './warning.js';
