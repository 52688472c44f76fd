export type PipesmithErrorCode =
  | 'RESOLUTION'
  | 'DISPATCH_NOT_FOUND'
  | 'BACKEND_NOT_FOUND'
  | 'AST_DETECTION'
  | 'REGISTRATION'
  | 'OPERATOR_NOT_FOUND'
  | 'PIPELINE_CONSUMED'
  | 'FROZEN_RUNTIME'
  | 'VERB_ARGUMENT_ONLY';

export class PipesmithError extends Error {
  constructor(message: string, public readonly code: PipesmithErrorCode) {
    super(message);
    this.name = 'PipesmithError';
  }
}

/** A reference could not be resolved against the subject. */
export class ResolutionError extends PipesmithError {
  constructor(public readonly key: unknown, public readonly level: number, reason: string) {
    super(`Cannot resolve ${describeKey(key)} at level ${level}: ${reason}`, 'RESOLUTION');
    this.name = 'ResolutionError';
  }
}

export class DispatchNotFoundError extends PipesmithError {
  constructor(public readonly generic: string, public readonly types: string[]) {
    super(
      `\`${generic}\` is not implemented for type${types.length === 1 ? '' : 's'}: ${types.join(', ') || '(no arguments)'}`,
      'DISPATCH_NOT_FOUND',
    );
    this.name = 'DispatchNotFoundError';
  }
}

export class BackendNotFoundError extends PipesmithError {
  constructor(public readonly generic: string, public readonly backend: string) {
    super(`Backend "${backend}" has no implementation registered for \`${generic}\``, 'BACKEND_NOT_FOUND');
    this.name = 'BackendNotFoundError';
  }
}

/** Raised when the call mode cannot be detected and the fallback policy is `raise`. */
export class CallModeDetectionError extends PipesmithError {
  constructor(public readonly callable: string, public readonly location?: string) {
    super(
      `Cannot determine whether \`${callable}\` is called in piping or normal mode` +
        (location ? ` (at ${location})` : ''),
      'AST_DETECTION',
    );
    this.name = 'CallModeDetectionError';
  }
}

export class RegistrationError extends PipesmithError {
  constructor(message: string) {
    super(message, 'REGISTRATION');
    this.name = 'RegistrationError';
  }
}

export class OperatorNotFoundError extends PipesmithError {
  constructor(public readonly operator: string) {
    super(`No handler registered for operator "${operator}"`, 'OPERATOR_NOT_FOUND');
    this.name = 'OperatorNotFoundError';
  }
}

export class PipelineConsumedError extends PipesmithError {
  constructor(public readonly callable: string) {
    super(`Pipeline call \`${callable}\` has already been evaluated against a subject`, 'PIPELINE_CONSUMED');
    this.name = 'PipelineConsumedError';
  }
}

export class FrozenRuntimeError extends PipesmithError {
  constructor(action: string) {
    super(`Cannot ${action}: runtime is frozen`, 'FROZEN_RUNTIME');
    this.name = 'FrozenRuntimeError';
  }
}

/** A function registered with `verbArgOnly` was run outside the arguments of a pipeline call. */
export class VerbArgumentOnlyError extends PipesmithError {
  constructor(public readonly callable: string) {
    super(`\`${callable}\` must only be used inside the arguments of a pipeline call`, 'VERB_ARGUMENT_ONLY');
    this.name = 'VerbArgumentOnlyError';
  }
}

export function describeKey(key: unknown): string {
  if (typeof key === 'string') return `"${key}"`;
  if (typeof key === 'symbol') return key.toString();
  return String(key);
}
