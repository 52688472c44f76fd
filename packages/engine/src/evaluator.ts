import { Context } from './context.js';
import type { ContextBase } from './context.js';
import type { KeywordArgs } from './keywords.js';
import {
  Expression,
  FunctionCallNode,
  OperatorCallNode,
  PipelineCallNode,
  ReferenceNode,
  SymbolNode,
  isCallTarget,
  isPlainObject,
} from './nodes.js';
import { getRuntime } from './runtime.js';
import type { Runtime } from './runtime.js';

/** Per-keyword evaluation contexts, overriding the call's context for that keyword. */
export type KeywordContexts = Readonly<Record<string, ContextBase>>;

export interface EvaluatedArguments {
  args: unknown[];
  kwargs: Record<string, unknown>;
}

/**
 * Structural recursion over an expression tree against a subject.
 * Never mutates the tree; the same tree, subject and context give the same result.
 */
export class Evaluator {
  private pipelineArgumentDepth = 0;

  constructor(readonly runtime: Runtime) {}

  /** True while the arguments of a pipeline call are being evaluated. */
  get inPipelineArguments(): boolean {
    return this.pipelineArgumentDepth > 0;
  }

  withinPipelineArguments<T>(fn: () => T): T {
    this.pipelineArgumentDepth++;
    try {
      return fn();
    } finally {
      this.pipelineArgumentDepth--;
    }
  }

  /** The root node is treated as a direct reference: its parent sees `context` too. */
  evaluate(node: unknown, subject: unknown, context: ContextBase = Context.EVAL): unknown {
    if (node instanceof Expression) return this.evaluateNode(node, subject, context, true);
    return this.evaluateArgument(node, subject, context);
  }

  /** Evaluate one call argument: expressions (also inside plain arrays/objects) are evaluated, other values pass through. */
  evaluateArgument(value: unknown, subject: unknown, context: ContextBase): unknown {
    if (value instanceof Expression) return this.evaluateNode(value, subject, context, false);
    if (Array.isArray(value)) return value.map((v) => this.evaluateArgument(v, subject, context));
    if (isPlainObject(value)) {
      return Object.fromEntries(
        Object.entries(value).map(([k, v]) => [k, this.evaluateArgument(v, subject, context)]),
      );
    }
    return value;
  }

  evaluateArguments(
    args: readonly unknown[],
    kwargs: KeywordArgs,
    subject: unknown,
    context: ContextBase,
    kwContexts: KeywordContexts = {},
  ): EvaluatedArguments {
    return {
      args: args.map((a) => this.evaluateArgument(a, subject, context.argsContext)),
      kwargs: Object.fromEntries(
        Object.entries(kwargs).map(([k, v]) => [
          k,
          this.evaluateArgument(v, subject, kwContexts[k] ?? context.kwargsContext),
        ]),
      ),
    };
  }

  private evaluateNode(node: Expression, subject: unknown, context: ContextBase, direct: boolean): unknown {
    if (node instanceof SymbolNode) return subject;
    if (node instanceof ReferenceNode) return this.evaluateReference(node, subject, context, direct);
    if (node instanceof OperatorCallNode) return this.evaluateOperator(node, subject, context);
    if (node instanceof PipelineCallNode) {
      return node.callee.evaluatePipeline(node, subject, context, this);
    }
    if (node instanceof FunctionCallNode) return this.evaluateFunctionCall(node, subject, context);
    throw new TypeError(`Unsupported expression node: ${node.kind}`);
  }

  private evaluateReference(node: ReferenceNode, subject: unknown, context: ContextBase, direct: boolean): unknown {
    if (context.pending) return node;

    // Once wrapped by another operation a reference needs a real parent value.
    const parentContext = direct || node.isDirect ? context : Context.EVAL;
    const parent = this.evaluateNode(node.parent, subject, parentContext, false);

    if (node.refKind === 'attr') {
      return context.getattr(parent, attributeKey(node.key), node.level);
    }
    const key = context.resolveKey(node.key, (k, keyContext) => this.evaluateNode(k, subject, keyContext, false));
    return context.getitem(parent, key, node.level);
  }

  private evaluateOperator(node: OperatorCallNode, subject: unknown, context: ContextBase): unknown {
    const [lhs, rhs] = node.operands;
    if (node.piping && rhs instanceof PipelineCallNode) {
      const piped = this.evaluateArgument(lhs, subject, Context.EVAL);
      return rhs.callee.evaluatePipeline(rhs, piped, context, this);
    }
    const operands = node.operands.map((o) => this.evaluateArgument(o, subject, Context.EVAL));
    return this.runtime.operators.apply(node.op, operands);
  }

  private evaluateFunctionCall(node: FunctionCallNode, subject: unknown, inherited: ContextBase): unknown {
    const { callee } = node;
    if (isCallTarget(callee)) return callee.evaluateFunction(node, subject, inherited, this);

    const context = node.context ?? inherited;
    const run = (): unknown => {
      const { args, kwargs } = this.evaluateArguments(node.args, node.kwargs, subject, context);
      const callArgs = node.hasKeywords ? [...args, kwargs] : args;

      if (callee instanceof ReferenceNode && callee.refKind === 'attr') {
        // method call: bind `this` to the evaluated owner
        const owner = this.evaluateNode(callee.parent, subject, Context.EVAL, false);
        const method = Context.EVAL.getattr(owner, attributeKey(callee.key), callee.level);
        if (typeof method !== 'function') throw new TypeError(`${String(callee)} is not callable`);
        return Reflect.apply(method, owner, callArgs);
      }
      if (callee instanceof Expression) {
        const fn = this.evaluateNode(callee, subject, Context.EVAL, false);
        if (typeof fn !== 'function') throw new TypeError(`${String(callee)} is not callable`);
        return Reflect.apply(fn, undefined, callArgs);
      }
      return callee(...callArgs);
    };
    return withDeclaredContext(context, inherited, run);
  }
}

/**
 * Run `fn` for a call that declares its own context; the inherited meta is
 * visible in the declared context for the duration of the call.
 */
export function withDeclaredContext<T>(declared: ContextBase, inherited: ContextBase, fn: () => T): T {
  if (declared === inherited) return fn();
  return declared.withMeta(inherited.meta, fn);
}

export function evaluate(expression: unknown, subject: unknown, context?: ContextBase): unknown {
  return new Evaluator(getRuntime()).evaluate(expression, subject, context);
}

function attributeKey(key: unknown): PropertyKey {
  return typeof key === 'string' || typeof key === 'symbol' || typeof key === 'number' ? key : String(key);
}
