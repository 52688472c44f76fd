import { RuntimeEnvSchema, RuntimeOptionsSchema } from '@pipesmith/types';
import type { RuntimeOptions } from '@pipesmith/types';

/**
 * Runtime options from environment variables:
 * PIPESMITH_AST_FALLBACK, PIPESMITH_ASSUME_ALL_PIPING, PIPESMITH_PIPING_OPERATOR.
 * Unset variables take the option defaults; invalid values throw a ZodError.
 */
export function loadOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RuntimeOptions {
  const parsed = RuntimeEnvSchema.parse(env);
  return RuntimeOptionsSchema.parse({
    astFallback: parsed.PIPESMITH_AST_FALLBACK,
    assumeAllPiping: parsed.PIPESMITH_ASSUME_ALL_PIPING,
    pipingOperator: parsed.PIPESMITH_PIPING_OPERATOR,
  });
}
