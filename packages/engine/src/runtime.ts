import { RuntimeOptionsSchema } from '@pipesmith/types';
import type { RuntimeOptions, RuntimeOptionsInput, RuntimeWarning } from '@pipesmith/types';
import type { CallModeResolver } from './call-mode.js';
import { FrozenRuntimeError } from './errors.js';
import { createConsoleLogger, formatWarning } from './logger.js';
import type { Logger } from './logger.js';
import type { ForeignHandler } from './nodes.js';
import { createDefaultOperators } from './operators.js';
import type { OperatorRegistry } from './operators.js';
import { DispatchRegistry } from './registry.js';

export interface RuntimeConfig {
  options?: RuntimeOptionsInput;
  logger?: Logger;
  operators?: OperatorRegistry;
  /** Copied, never shared. */
  dispatch?: DispatchRegistry;
  callModeResolver?: CallModeResolver;
  foreignHandler?: ForeignHandler;
}

/**
 * Process-wide configuration: options, operator table, dispatch tables,
 * logger and the pluggable call-mode and foreign-operation hooks.
 */
export class Runtime {
  readonly logger: Logger;
  readonly dispatch: DispatchRegistry;
  private currentOptions: RuntimeOptions;
  private currentOperators: OperatorRegistry;
  private resolver: CallModeResolver | undefined;
  private foreign: ForeignHandler | undefined;
  private readonly subjects: Array<{ value: unknown }> = [];
  private frozen = false;

  constructor(config: RuntimeConfig = {}) {
    this.logger = config.logger ?? createConsoleLogger();
    this.currentOptions = RuntimeOptionsSchema.parse(config.options ?? {});
    this.currentOperators = config.operators ?? createDefaultOperators();
    const onWarning = (warning: RuntimeWarning): void => this.warn(warning);
    this.dispatch = config.dispatch ? config.dispatch.clone(onWarning) : new DispatchRegistry(onWarning);
    this.resolver = config.callModeResolver;
    this.foreign = config.foreignHandler;
  }

  get options(): RuntimeOptions {
    return this.currentOptions;
  }

  get operators(): OperatorRegistry {
    return this.currentOperators;
  }

  get callModeResolver(): CallModeResolver | undefined {
    return this.resolver;
  }

  get foreignHandler(): ForeignHandler | undefined {
    return this.foreign;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  configure(patch: RuntimeOptionsInput): RuntimeOptions {
    this.assertMutable('configure options');
    this.currentOptions = RuntimeOptionsSchema.parse({ ...this.currentOptions, ...patch });
    return this.currentOptions;
  }

  useOperators(operators: OperatorRegistry): void {
    this.assertMutable('replace the operator registry');
    this.currentOperators = operators;
  }

  setCallModeResolver(resolver: CallModeResolver | undefined): void {
    this.assertMutable('replace the call-mode resolver');
    this.resolver = resolver;
  }

  setForeignHandler(handler: ForeignHandler | undefined): void {
    this.assertMutable('replace the foreign-operation handler');
    this.foreign = handler;
  }

  warn(warning: RuntimeWarning): void {
    this.logger.warn(formatWarning(warning));
  }

  /** Innermost ambient subject, if any. */
  ambientSubject(): { value: unknown } | undefined {
    return this.subjects[this.subjects.length - 1];
  }

  pushSubject(value: unknown): void {
    this.subjects.push({ value });
  }

  popSubject(): void {
    this.subjects.pop();
  }

  freeze(): this {
    this.frozen = true;
    this.dispatch.freeze();
    return this;
  }

  /** Unfrozen copy with its own dispatch tables. */
  clone(config: Pick<RuntimeConfig, 'logger'> = {}): Runtime {
    return new Runtime({
      options: this.currentOptions,
      logger: config.logger ?? this.logger,
      operators: this.currentOperators,
      dispatch: this.dispatch,
      callModeResolver: this.resolver,
      foreignHandler: this.foreign,
    });
  }

  private assertMutable(action: string): void {
    if (this.frozen) throw new FrozenRuntimeError(action);
  }
}

let active = new Runtime();

export function getRuntime(): Runtime {
  return active;
}

export function setRuntime(runtime: Runtime): Runtime {
  const previous = active;
  active = runtime;
  return previous;
}

/** Installs a fresh runtime with default options and empty dispatch tables. */
export function resetRuntime(config: RuntimeConfig = {}): Runtime {
  active = new Runtime(config);
  return active;
}

export function createRuntime(config: RuntimeConfig = {}): Runtime {
  return new Runtime(config);
}

/** Run `fn` with `runtime` active; the previous runtime is restored afterwards. */
export function withRuntime<T>(runtime: Runtime, fn: () => T): T {
  const previous = setRuntime(runtime);
  try {
    return fn();
  } finally {
    active = previous;
  }
}
