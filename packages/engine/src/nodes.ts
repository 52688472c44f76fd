import type { ContextBase } from './context.js';
import type { Evaluator } from './evaluator.js';
import { splitArguments, Keywords } from './keywords.js';
import type { AnyFunction, KeywordArgs } from './keywords.js';
import { getRuntime } from './runtime.js';

export type ReferenceKind = 'attr' | 'item';

/** Something a call node can invoke once its arguments are evaluated. */
export interface CallTarget {
  readonly name: string;
  evaluatePipeline(node: PipelineCallNode, subject: unknown, inherited: ContextBase, evaluator: Evaluator): unknown;
  evaluateFunction(node: FunctionCallNode, subject: unknown, inherited: ContextBase, evaluator: Evaluator): unknown;
}

export type Callee = Expression | CallTarget | AnyFunction;

export interface CallParts {
  args: readonly unknown[];
  kwargs: KeywordArgs;
  hasKeywords: boolean;
}

export interface CallNodeOptions {
  context?: ContextBase;
  backend?: string;
}

/**
 * Base of every expression node. Nodes are immutable; each builder returns a
 * new node that points at its operands.
 */
export abstract class Expression {
  abstract readonly kind: 'symbol' | 'reference' | 'operator' | 'function' | 'pipeline';

  attr(name: string): ReferenceNode {
    if (typeof name !== 'string') {
      throw new TypeError(`Attribute name must be a string, got ${typeof name}`);
    }
    return new ReferenceNode(this, name, 'attr');
  }

  item(key: unknown): ReferenceNode {
    assertValidKey(key);
    return new ReferenceNode(this, key, 'item');
  }

  /** Call the value this expression evaluates to. */
  call(...args: unknown[]): FunctionCallNode {
    return new FunctionCallNode(this, splitArguments(args));
  }

  /** Call a method of the evaluated value with `this` bound to it. */
  method(name: string, ...args: unknown[]): FunctionCallNode {
    return this.attr(name).call(...args);
  }

  op(symbol: string, ...others: unknown[]): OperatorCallNode {
    if (others.length === 0) return unary(symbol, this);
    if (others.length === 1) return binary(symbol, this, others[0]);
    return new OperatorCallNode(symbol, [this, ...others], false);
  }

  add(other: unknown): OperatorCallNode { return binary('+', this, other); }
  sub(other: unknown): OperatorCallNode { return binary('-', this, other); }
  mul(other: unknown): OperatorCallNode { return binary('*', this, other); }
  div(other: unknown): OperatorCallNode { return binary('/', this, other); }
  floordiv(other: unknown): OperatorCallNode { return binary('//', this, other); }
  mod(other: unknown): OperatorCallNode { return binary('%', this, other); }
  pow(other: unknown): OperatorCallNode { return binary('**', this, other); }
  lshift(other: unknown): OperatorCallNode { return binary('<<', this, other); }
  rshift(other: unknown): OperatorCallNode { return binary('>>', this, other); }
  bitAnd(other: unknown): OperatorCallNode { return binary('&', this, other); }
  bitOr(other: unknown): OperatorCallNode { return binary('|', this, other); }
  bitXor(other: unknown): OperatorCallNode { return binary('^', this, other); }
  eq(other: unknown): OperatorCallNode { return binary('==', this, other); }
  ne(other: unknown): OperatorCallNode { return binary('!=', this, other); }
  lt(other: unknown): OperatorCallNode { return binary('<', this, other); }
  le(other: unknown): OperatorCallNode { return binary('<=', this, other); }
  gt(other: unknown): OperatorCallNode { return binary('>', this, other); }
  ge(other: unknown): OperatorCallNode { return binary('>=', this, other); }
  and(other: unknown): OperatorCallNode { return binary('&&', this, other); }
  or(other: unknown): OperatorCallNode { return binary('||', this, other); }
  neg(): OperatorCallNode { return unary('-', this); }
  pos(): OperatorCallNode { return unary('+', this); }
  invert(): OperatorCallNode { return unary('~', this); }
  not(): OperatorCallNode { return unary('!', this); }

  /**
   * Hook for foreign elementwise operations (array libraries and the like):
   * returns the deferred node the active runtime builds for `fn(this, ...inputs)`.
   */
  foreign(fn: AnyFunction, ...inputs: unknown[]): Expression {
    return applyForeign(fn, [this, ...inputs]);
  }

  abstract toString(): string;
}

export class SymbolNode extends Expression {
  readonly kind = 'symbol' as const;

  constructor(readonly name: string = 'f') {
    super();
  }

  toString(): string {
    return this.name;
  }
}

export class ReferenceNode extends Expression {
  readonly kind = 'reference' as const;
  /**
   * Reference hops from the nearest non-reference parent; a symbol is level 0.
   * A reference on an operator or call result starts again at 1.
   */
  readonly level: number;

  constructor(
    readonly parent: Expression,
    readonly key: unknown,
    readonly refKind: ReferenceKind,
    readonly isDirect: boolean = false,
  ) {
    super();
    this.level = parent instanceof ReferenceNode ? parent.level + 1 : 1;
  }

  /** Same reference, flagged as the whole argument of a call. */
  asDirect(): ReferenceNode {
    return this.isDirect ? this : new ReferenceNode(this.parent, this.key, this.refKind, true);
  }

  toString(): string {
    const parent = this.parent instanceof OperatorCallNode ? `(${this.parent})` : String(this.parent);
    if (this.refKind === 'attr') return `${parent}.${String(this.key)}`;
    return `${parent}[${formatValue(this.key)}]`;
  }
}

export class OperatorCallNode extends Expression {
  readonly kind = 'operator' as const;
  readonly operands: readonly unknown[];

  /**
   * `piping` is decided when the node is built: the operator was the active
   * piping operator and the right operand a pipeline call.
   */
  constructor(readonly op: string, operands: readonly unknown[], readonly piping: boolean) {
    super();
    this.operands = Object.freeze([...operands]);
  }

  toString(): string {
    const parts = this.operands.map((o) => (o instanceof OperatorCallNode ? `(${o})` : formatValue(o)));
    if (parts.length === 1) return `${this.op}${parts[0]}`;
    return parts.join(` ${this.op} `);
  }
}

abstract class CallNode extends Expression {
  readonly args: readonly unknown[];
  readonly kwargs: KeywordArgs;
  readonly hasKeywords: boolean;
  readonly context: ContextBase | undefined;
  readonly backend: string | undefined;

  constructor(parts: CallParts, options: CallNodeOptions) {
    super();
    this.args = Object.freeze(parts.args.map(markDirect));
    this.kwargs = Object.freeze(
      Object.fromEntries(Object.entries(parts.kwargs).map(([k, v]) => [k, markDirect(v)])),
    );
    this.hasKeywords = parts.hasKeywords;
    this.context = options.context;
    this.backend = options.backend;
  }

  protected abstract calleeName(): string;

  toString(): string {
    const rendered = this.args.map(formatValue);
    for (const [key, value] of Object.entries(this.kwargs)) {
      rendered.push(`${key}=${formatValue(value)}`);
    }
    return `${this.calleeName()}(${rendered.join(', ')})`;
  }
}

export class FunctionCallNode extends CallNode {
  readonly kind = 'function' as const;

  constructor(readonly callee: Callee, parts: CallParts, options: CallNodeOptions = {}) {
    super(parts, options);
  }

  protected calleeName(): string {
    if (this.callee instanceof Expression) return String(this.callee);
    if (isCallTarget(this.callee)) return this.callee.name;
    return this.callee.name || '<anonymous>';
  }
}

/** A call to a pipeable callable that is waiting for its subject. */
export class PipelineCallNode extends CallNode {
  readonly kind = 'pipeline' as const;

  constructor(readonly callee: CallTarget, parts: CallParts, options: CallNodeOptions = {}) {
    super(parts, options);
  }

  protected calleeName(): string {
    return this.callee.name;
  }
}

export function symbol(name?: string): SymbolNode {
  return new SymbolNode(name);
}

/** The default root symbol. */
export const f = new SymbolNode('f');

/** `ref('a', 'b')` is `f.attr('a').attr('b')`; numeric keys become subscripts. */
export function ref(...keys: Array<string | number>): Expression {
  let node: Expression = f;
  for (const key of keys) {
    node = typeof key === 'number' ? node.item(key) : node.attr(key);
  }
  return node;
}

export function binary(op: string, lhs: unknown, rhs: unknown): OperatorCallNode {
  const piping = op === getRuntime().options.pipingOperator && rhs instanceof PipelineCallNode;
  return new OperatorCallNode(op, [lhs, rhs], piping);
}

export function unary(op: string, operand: unknown): OperatorCallNode {
  return new OperatorCallNode(op, [operand], false);
}

export type ForeignHandler = (fn: AnyFunction, inputs: readonly unknown[], kwargs: KeywordArgs) => Expression;

export const wrapForeignOperation: ForeignHandler = (fn, inputs, kwargs) =>
  new FunctionCallNode(fn, {
    args: inputs,
    kwargs,
    hasKeywords: Object.keys(kwargs).length > 0,
  });

export function applyForeign(fn: AnyFunction, inputs: readonly unknown[], kwargs: KeywordArgs = {}): Expression {
  const handler = getRuntime().foreignHandler ?? wrapForeignOperation;
  return handler(fn, inputs, kwargs);
}

export function isExpression(value: unknown): value is Expression {
  return value instanceof Expression;
}

export function isCallTarget(value: unknown): value is CallTarget {
  return (
    typeof value === 'object' &&
    value !== null &&
    'evaluatePipeline' in value &&
    'evaluateFunction' in value
  );
}

/** True when `value` is, or (inside plain arrays/objects) contains, an expression. */
export function containsExpression(value: unknown): boolean {
  if (value instanceof Expression) return true;
  if (value instanceof Keywords) return containsExpression(value.values);
  if (Array.isArray(value)) return value.some(containsExpression);
  if (isPlainObject(value)) return Object.values(value).some(containsExpression);
  return false;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function markDirect(value: unknown): unknown {
  return value instanceof ReferenceNode ? value.asDirect() : value;
}

function assertValidKey(key: unknown): void {
  if (key instanceof Expression) return;
  const t = typeof key;
  if (key === null || (t !== 'object' && t !== 'function')) return;
  throw new TypeError(`Invalid subscript key: ${Object.prototype.toString.call(key)}`);
}

function formatValue(value: unknown): string {
  if (value instanceof Expression) return value.toString();
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'symbol') return value.toString();
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`;
  if (isPlainObject(value)) {
    return `{${Object.entries(value).map(([k, v]) => `${k}: ${formatValue(v)}`).join(', ')}}`;
  }
  return String(value);
}
