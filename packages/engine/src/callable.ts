import { FallbackPolicySchema, GenericOptionsSchema } from '@pipesmith/types';
import type { CallMode, DispatchStrategy, FallbackPolicy } from '@pipesmith/types';
import { resolveCallMode } from './call-mode.js';
import type { CallSite } from './call-mode.js';
import type { ContextBase } from './context.js';
import { RegistrationError, VerbArgumentOnlyError } from './errors.js';
import { Evaluator, withDeclaredContext } from './evaluator.js';
import type { EvaluatedArguments, KeywordContexts } from './evaluator.js';
import { implementationArguments, splitArguments } from './keywords.js';
import type { AnyFunction, SplitArguments } from './keywords.js';
import { FunctionCallNode, PipelineCallNode, containsExpression } from './nodes.js';
import type { CallTarget } from './nodes.js';
import { DispatchRegistry, isTypeList } from './registry.js';
import type { GenericDefinition, RegisterOptions, Resolution } from './registry.js';
import { getRuntime } from './runtime.js';
import type { Runtime } from './runtime.js';
import { typeOf } from './type-lineage.js';
import type { DispatchType } from './type-lineage.js';

export interface RegisterCallableOptions {
  /** Defaults to the implementation's function name. */
  name?: string;
  /** Types the implementation handles; including `Object` makes it the default for every type. */
  types?: DispatchType | readonly DispatchType[];
  dispatch?: DispatchStrategy;
  /** Context for evaluating expression arguments; inherited from the caller when absent. */
  context?: ContextBase;
  kwContext?: KeywordContexts;
  astFallback?: FallbackPolicy;
  pipeable?: boolean;
  /** The subject is never passed positionally; calls always defer. Requires `pipeable`. */
  dependent?: boolean;
  /** Parameter count used for call-mode detection; defaults to `impl.length`. */
  arity?: number;
  /** Plain functions only: calls always defer, and run only inside the arguments of a pipeline call. */
  verbArgOnly?: boolean;
}

interface CallableMembers<Self> {
  readonly generic: Generic;
  /** Add an implementation for more types, or another backend for registered ones. */
  register(types: DispatchType | readonly DispatchType[], impl: AnyFunction, options?: RegisterOptions): void;
  /** Same callable, dispatching only to `backend`. */
  using(backend: string): Self;
  /** Force piping mode. */
  piped(...args: unknown[]): unknown;
  /** Force normal mode with `subject` as the first argument. */
  direct(subject: unknown, ...args: unknown[]): unknown;
  invoke(mode: CallMode, ...args: unknown[]): unknown;
}

export interface Callable extends CallableMembers<Callable> {
  (...args: unknown[]): unknown;
}

export interface DependentCallable extends CallableMembers<DependentCallable> {
  (...args: unknown[]): PipelineCallNode;
}

/** A named generic function with type-dispatched implementations. */
export class Generic implements CallTarget {
  readonly strategy: DispatchStrategy;
  readonly context: ContextBase | undefined;
  readonly kwContext: KeywordContexts;
  readonly astFallback: FallbackPolicy | undefined;
  readonly pipeable: boolean;
  readonly dependent: boolean;
  readonly arity: number;
  readonly verbArgOnly: boolean;
  private readonly definition: GenericDefinition;
  /** Implementation for the specific types given at construction; replayed into every runtime. */
  private readonly primary: { types: readonly DispatchType[]; impl: AnyFunction; context: ContextBase | undefined };
  /** Tables for frozen runtimes that never saw this generic. */
  private readonly detached = new WeakMap<Runtime, DispatchRegistry>();

  constructor(readonly name: string, impl: AnyFunction, options: RegisterCallableOptions = {}) {
    const parsed = GenericOptionsSchema.parse({
      name,
      dispatch: options.dispatch,
      pipeable: options.pipeable,
      dependent: options.dependent,
      arity: options.arity,
      verbArgOnly: options.verbArgOnly,
    });
    this.strategy = parsed.dispatch;
    this.pipeable = parsed.pipeable;
    this.dependent = parsed.dependent;
    this.arity = parsed.arity ?? impl.length;
    this.verbArgOnly = parsed.verbArgOnly;
    this.astFallback = FallbackPolicySchema.optional().parse(options.astFallback);
    this.context = options.context;
    this.kwContext = options.kwContext ?? {};

    const types = normalizeTypes(options.types ?? Object);
    const isDefault = types.includes(Object);
    this.definition = {
      strategy: this.strategy,
      fallback: isDefault ? impl : undefined,
      fallbackContext: isDefault ? options.context : undefined,
    };

    this.primary = { types: types.filter((t) => t !== Object), impl, context: options.context };
    this.defineIn(getRuntime().dispatch);
  }

  /** The implementation the generic was created with. */
  get original(): AnyFunction {
    return this.primary.impl;
  }

  register(types: DispatchType | readonly DispatchType[], impl: AnyFunction, options: RegisterOptions = {}): void {
    const registry = this.registryOf(getRuntime());
    registry.register(this.name, types, impl, options);
  }

  /** Whether the active runtime has an implementation for `value` (the default counts). */
  canDispatch(value: unknown, runtime: Runtime = getRuntime()): boolean {
    return this.registryOf(runtime).canDispatch(this.name, value);
  }

  evaluatePipeline(node: PipelineCallNode, subject: unknown, inherited: ContextBase, evaluator: Evaluator): unknown {
    return this.run(node, { value: subject }, subject, inherited, evaluator);
  }

  evaluateFunction(node: FunctionCallNode, subject: unknown, inherited: ContextBase, evaluator: Evaluator): unknown {
    if (this.verbArgOnly && !evaluator.inPipelineArguments) throw new VerbArgumentOnlyError(this.name);
    return this.run(node, undefined, subject, inherited, evaluator);
  }

  private run(
    node: PipelineCallNode | FunctionCallNode,
    data: { value: unknown } | undefined,
    subject: unknown,
    inherited: ContextBase,
    evaluator: Evaluator,
  ): unknown {
    const registry = this.registryOf(evaluator.runtime);
    const declared = node.context ?? this.context ?? inherited;
    const evaluateUnder = (context: ContextBase): EvaluatedArguments => {
      const evaluate = () => evaluator.evaluateArguments(node.args, node.kwargs, subject, context, this.kwContext);
      return data ? evaluator.withinPipelineArguments(evaluate) : evaluate();
    };
    const call = (resolution: Resolution, context: ContextBase, evaluated?: EvaluatedArguments): unknown =>
      withDeclaredContext(context, inherited, () => {
        const { args, kwargs } = evaluated ?? evaluateUnder(context);
        return resolution.impl(...implementationArguments(data, args, kwargs, node.hasKeywords));
      });

    // The piped subject decides first-arg dispatch before any argument is evaluated.
    if (data && this.strategy === 'first-arg-type') {
      const resolution = registry.resolve(this.name, typeOf(data.value), node.backend);
      return call(resolution, node.context ?? resolution.context ?? declared);
    }

    // Otherwise dispatch on evaluated values; re-evaluate when the chosen implementation declares another context.
    const evaluated = withDeclaredContext(declared, inherited, () => evaluateUnder(declared));
    const values = data ? [data.value, ...evaluated.args] : evaluated.args;
    const resolution = registry.dispatch(this.name, values, evaluated.kwargs, node.backend);
    const context = node.context ?? resolution.context ?? declared;
    return call(resolution, context, context === declared ? evaluated : undefined);
  }

  private registryOf(runtime: Runtime): DispatchRegistry {
    const registry = runtime.dispatch;
    if (registry.has(this.name)) return registry;
    if (!registry.isFrozen) {
      this.defineIn(registry);
      return registry;
    }
    // A frozen runtime is never written to; it resolves against the generic's own table.
    let own = this.detached.get(runtime);
    if (!own) {
      own = new DispatchRegistry((warning) => runtime.warn(warning));
      this.defineIn(own);
      own.freeze();
      this.detached.set(runtime, own);
    }
    return own;
  }

  private defineIn(registry: DispatchRegistry): void {
    registry.define(this.name, this.definition);
    const { types, impl, context } = this.primary;
    if (types.length > 0) registry.register(this.name, types, impl, { context });
  }
}

/**
 * Register a generic callable. The returned function decides per call whether
 * it was given its subject (normal mode, evaluates now) or is waiting for one
 * (piping mode, returns a pipeline call).
 */
export function register(impl: AnyFunction, options: RegisterCallableOptions & { dependent: true }): DependentCallable;
export function register(impl: AnyFunction, options?: RegisterCallableOptions): Callable;
export function register(impl: AnyFunction, options: RegisterCallableOptions = {}): Callable | DependentCallable {
  const generic = new Generic(options.name ?? impl.name, impl, options);
  return generic.dependent ? dependentCallable(generic, undefined) : callable(generic, undefined);
}

type VerbOptions = Omit<RegisterCallableOptions, 'pipeable' | 'dispatch' | 'verbArgOnly'>;

/** Pipeable callable dispatching on its subject. */
export function registerVerb(
  impl: AnyFunction,
  options: VerbOptions & { dependent: true },
): DependentCallable;
export function registerVerb(impl: AnyFunction, options?: VerbOptions): Callable;
export function registerVerb(
  impl: AnyFunction,
  options: VerbOptions = {},
): Callable | DependentCallable {
  const generic = new Generic(options.name ?? impl.name, impl, { ...options, pipeable: true, dispatch: 'first-arg-type' });
  return generic.dependent ? dependentCallable(generic, undefined) : callable(generic, undefined);
}

/** Plain generic function: called with expressions it defers, otherwise it runs now. */
export function registerFunc(
  impl: AnyFunction,
  options: Omit<RegisterCallableOptions, 'pipeable' | 'dependent' | 'astFallback'> = {},
): Callable {
  return callable(new Generic(options.name ?? impl.name, impl, { ...options, pipeable: false, dependent: false }), undefined);
}

/** The implementation a callable was registered with. */
export function unregister(fn: AnyFunction): AnyFunction {
  const generic = 'generic' in fn ? fn.generic : undefined;
  if (!(generic instanceof Generic)) {
    throw new RegistrationError(`Function is not a registered callable: ${fn.name || '(anonymous)'}`);
  }
  return generic.original;
}

function callable(generic: Generic, backend: string | undefined): Callable {
  const call = (...raw: unknown[]): unknown => {
    const parts = splitArguments(raw);
    if (!generic.pipeable) return callFunction(generic, parts, backend);
    const runtime = getRuntime();
    const mode = resolveCallMode(callSite(generic, parts, runtime), runtime, {
      policy: generic.astFallback,
      entry: call,
    });
    return mode === 'piping' ? callPiped(generic, parts, backend) : callDirect(generic, parts, backend);
  };
  return Object.assign(call, members(generic, backend, (b) => callable(generic, b)));
}

function dependentCallable(generic: Generic, backend: string | undefined): DependentCallable {
  const call = (...raw: unknown[]): PipelineCallNode => new PipelineCallNode(generic, splitArguments(raw), { backend });
  return Object.assign(call, members(generic, backend, (b) => dependentCallable(generic, b)));
}

function members<Self>(
  generic: Generic,
  backend: string | undefined,
  rebind: (backend: string) => Self,
): CallableMembers<Self> {
  const piped = (...raw: unknown[]): unknown => {
    if (!generic.pipeable) throw new TypeError(`\`${generic.name}\` is not pipeable`);
    return callPiped(generic, splitArguments(raw), backend);
  };
  const direct = (subject: unknown, ...raw: unknown[]): unknown => {
    const parts = splitArguments([subject, ...raw]);
    return generic.pipeable ? callDirect(generic, parts, backend) : callFunction(generic, parts, backend);
  };
  return {
    generic,
    register: (types, impl, options) => generic.register(types, impl, options),
    using: rebind,
    piped,
    direct,
    invoke: (mode, ...args) => (mode === 'piping' ? piped(...args) : direct(args[0], ...args.slice(1))),
  };
}

function callSite(generic: Generic, parts: SplitArguments, runtime: Runtime): CallSite {
  return {
    callable: generic.name,
    args: parts.args,
    kwargs: parts.kwargs,
    hasKeywords: parts.hasKeywords,
    arity: generic.arity,
    isDispatchable: (value) => generic.canDispatch(value, runtime),
  };
}

/** Piping mode: a pipeline call, or its value right away when an ambient subject is set. */
function callPiped(generic: Generic, parts: SplitArguments, backend: string | undefined): unknown {
  const node = new PipelineCallNode(generic, parts, { backend });
  const runtime = getRuntime();
  const ambient = runtime.ambientSubject();
  return ambient ? new Evaluator(runtime).evaluate(node, ambient.value) : node;
}

/** Normal mode: the first argument is the subject. */
function callDirect(generic: Generic, parts: SplitArguments, backend: string | undefined): unknown {
  if (parts.args.length === 0) {
    throw new TypeError(`\`${generic.name}\` called in normal mode without a subject`);
  }
  const [subject, ...rest] = parts.args;
  if (containsExpression(subject)) {
    return deferOrRun(new FunctionCallNode(generic, parts, { backend }));
  }
  const node = new PipelineCallNode(generic, { ...parts, args: rest }, { backend });
  return new Evaluator(getRuntime()).evaluate(node, subject);
}

function callFunction(generic: Generic, parts: SplitArguments, backend: string | undefined): unknown {
  const node = new FunctionCallNode(generic, parts, { backend });
  if (generic.verbArgOnly || containsExpression(parts.args) || containsExpression(parts.kwargs)) {
    return deferOrRun(node);
  }
  return new Evaluator(getRuntime()).evaluate(node, undefined);
}

function deferOrRun(node: FunctionCallNode): unknown {
  const runtime = getRuntime();
  const ambient = runtime.ambientSubject();
  return ambient ? new Evaluator(runtime).evaluate(node, ambient.value) : node;
}

function normalizeTypes(types: DispatchType | readonly DispatchType[]): readonly DispatchType[] {
  return isTypeList(types) ? types : [types];
}
