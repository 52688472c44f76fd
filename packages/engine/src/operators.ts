import { OperatorNotFoundError } from './errors.js';

/** Receives the evaluated operands; unary operators get one, binary ones two. */
export type OperatorHandler = (...operands: unknown[]) => unknown;

export class OperatorRegistry {
  private readonly handlers: ReadonlyMap<string, OperatorHandler>;

  constructor(handlers: Iterable<[string, OperatorHandler]> = []) {
    this.handlers = new Map(handlers);
  }

  get(op: string): OperatorHandler {
    const handler = this.handlers.get(op);
    if (!handler) throw new OperatorNotFoundError(op);
    return handler;
  }

  has(op: string): boolean {
    return this.handlers.has(op);
  }

  symbols(): string[] {
    return Array.from(this.handlers.keys());
  }

  /** New registry with `overrides` replacing or adding handlers. */
  extend(overrides: Record<string, OperatorHandler>): OperatorRegistry {
    return new OperatorRegistry([...this.handlers, ...Object.entries(overrides)]);
  }

  apply(op: string, operands: readonly unknown[]): unknown {
    return this.get(op)(...operands);
  }
}

export function createDefaultOperators(): OperatorRegistry {
  return new OperatorRegistry(Object.entries(DEFAULT_HANDLERS));
}

const DEFAULT_HANDLERS: Record<string, OperatorHandler> = {
  '+': (...o) => (o.length === 1 ? toNumber(o[0]) : plus(o[0], o[1])),
  '-': (...o) => (o.length === 1 ? negate(o[0]) : numeric((x, y) => x - y, (x, y) => x - y)(o[0], o[1])),
  '*': numeric((x, y) => x * y, (x, y) => x * y),
  '/': numeric((x, y) => x / y, (x, y) => x / y),
  '//': numeric((x, y) => Math.floor(x / y), floorDivide),
  '%': numeric((x, y) => x % y, (x, y) => x % y),
  '**': numeric((x, y) => x ** y, (x, y) => x ** y),
  '&': numeric((x, y) => x & y, (x, y) => x & y),
  '|': numeric((x, y) => x | y, (x, y) => x | y),
  '^': numeric((x, y) => x ^ y, (x, y) => x ^ y),
  '<<': numeric((x, y) => x << y, (x, y) => x << y),
  '>>': numeric((x, y) => x >> y, (x, y) => x >> y),
  '~': (a) => (typeof a === 'bigint' ? ~a : ~Number(a)),
  '!': (a) => !a,
  '&&': (a, b) => a && b,
  '||': (a, b) => a || b,
  '==': (a, b) => a === b,
  '!=': (a, b) => a !== b,
  '<': (a, b) => compare(a, b) < 0,
  '<=': (a, b) => compare(a, b) <= 0,
  '>': (a, b) => compare(a, b) > 0,
  '>=': (a, b) => compare(a, b) >= 0,
};

/** BigInt pairs use the native operator; mixing BigInt with another type is a TypeError, as in JavaScript. */
function numeric(
  onNumber: (x: number, y: number) => number,
  onBigInt: (x: bigint, y: bigint) => bigint,
): OperatorHandler {
  return (a, b) => {
    if (typeof a === 'bigint' && typeof b === 'bigint') return onBigInt(a, b);
    if (typeof a === 'bigint' || typeof b === 'bigint') throw mixedBigInt();
    return onNumber(Number(a), Number(b));
  };
}

function plus(a: unknown, b: unknown): unknown {
  if (typeof a === 'string' || typeof b === 'string') return String(a) + String(b);
  return numeric((x, y) => x + y, (x, y) => x + y)(a, b);
}

function negate(value: unknown): unknown {
  return typeof value === 'bigint' ? -value : -Number(value);
}

function toNumber(value: unknown): number {
  if (typeof value === 'bigint') throw new TypeError('Cannot convert a BigInt value to a number');
  return Number(value);
}

function floorDivide(x: bigint, y: bigint): bigint {
  const q = x / y;
  return x % y !== 0n && x < 0n !== y < 0n ? q - 1n : q;
}

function mixedBigInt(): TypeError {
  return new TypeError('Cannot mix BigInt and other types, use explicit conversions');
}

// NaN when the operands are not comparable, so every ordering test is false.
function compare(a: unknown, b: unknown): number {
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'bigint' || typeof b === 'bigint') {
    const x = typeof a === 'bigint' ? a : Number(a);
    const y = typeof b === 'bigint' ? b : Number(b);
    if (x < y) return -1;
    if (x > y) return 1;
    return x == y ? 0 : NaN;
  }
  const x = Number(a);
  const y = Number(b);
  if (x < y) return -1;
  if (x > y) return 1;
  return x === y ? 0 : NaN;
}
