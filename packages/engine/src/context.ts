import { ResolutionError } from './errors.js';
import { Expression } from './nodes.js';

export type Meta = Readonly<Record<string, unknown>>;
export type KeyEvaluator = (key: Expression, context: ContextBase) => unknown;

/**
 * Strategy deciding what a reference means against a live subject.
 *
 * Subclass it to add a context; override `getattr`/`getitem` for the access
 * itself and `keyContext` for how subscript keys are evaluated.
 */
export abstract class ContextBase {
  private currentMeta: Meta = {};

  /** When true, references evaluate to themselves. */
  readonly pending: boolean = false;

  abstract readonly name: string;

  abstract getattr(parent: unknown, key: PropertyKey, level: number): unknown;
  abstract getitem(parent: unknown, key: unknown, level: number): unknown;

  /** Context used to evaluate an expression placed inside a subscript. */
  get keyContext(): ContextBase {
    return this;
  }

  /** Context for the positional arguments of a call declared in this context. */
  get argsContext(): ContextBase {
    return this;
  }

  /** Context for the keyword arguments of a call declared in this context. */
  get kwargsContext(): ContextBase {
    return this;
  }

  resolveKey(key: unknown, evaluateKey: KeyEvaluator): unknown {
    return key instanceof Expression ? evaluateKey(key, this.keyContext) : key;
  }

  get meta(): Meta {
    return this.currentMeta;
  }

  /** Run `fn` with `overrides` merged into the meta; the previous meta is restored on every exit path. */
  withMeta<T>(overrides: Meta, fn: () => T): T {
    const previous = this.currentMeta;
    this.currentMeta = { ...previous, ...overrides };
    try {
      return fn();
    } finally {
      this.currentMeta = previous;
    }
  }

  toString(): string {
    return `Context<${this.name}>`;
  }
}

export class EvalContext extends ContextBase {
  readonly name: string = 'eval';

  getattr(parent: unknown, key: PropertyKey, level: number): unknown {
    if (parent === null || parent === undefined) {
      throw new ResolutionError(key, level, `parent is ${String(parent)}`);
    }
    const target: object = Object(parent);
    if (!(key in target)) {
      throw new ResolutionError(key, level, 'no such attribute');
    }
    return Reflect.get(target, key);
  }

  getitem(parent: unknown, key: unknown, level: number): unknown {
    if (parent === null || parent === undefined) {
      throw new ResolutionError(key, level, `parent is ${String(parent)}`);
    }
    if (parent instanceof Map) {
      if (!parent.has(key)) throw new ResolutionError(key, level, 'no such key');
      return parent.get(key);
    }
    if ((Array.isArray(parent) || typeof parent === 'string') && typeof key === 'number') {
      return indexSequence(parent, key, level);
    }
    if (!isPropertyKey(key)) {
      throw new ResolutionError(key, level, `unsupported key type ${typeof key}`);
    }
    const target: object = Object(parent);
    if (!(key in target)) throw new ResolutionError(key, level, 'no such key');
    return Reflect.get(target, key);
  }
}

/** References become the names they refer to. */
export class SelectContext extends ContextBase {
  readonly name: string = 'select';

  getattr(_parent: unknown, key: PropertyKey, _level: number): unknown {
    return key;
  }

  getitem(_parent: unknown, key: unknown, _level: number): unknown {
    return key;
  }
}

export class PendingContext extends EvalContext {
  override readonly name: string = 'pending';
  override readonly pending: boolean = true;
}

/** Positional arguments evaluate under one context, keyword arguments under another. */
export class MixedContext extends ContextBase {
  readonly name: string = 'mixed';

  constructor(
    private readonly positional: ContextBase,
    private readonly keyword: ContextBase,
  ) {
    super();
  }

  override get argsContext(): ContextBase {
    return this.positional;
  }

  override get kwargsContext(): ContextBase {
    return this.keyword;
  }

  getattr(_parent: unknown, key: PropertyKey, level: number): unknown {
    throw new ResolutionError(key, level, 'the mixed context only applies to call arguments');
  }

  getitem(_parent: unknown, key: unknown, level: number): unknown {
    throw new ResolutionError(key, level, 'the mixed context only applies to call arguments');
  }
}

const EVAL = new EvalContext();
const SELECT = new SelectContext();

export const Context = {
  EVAL,
  SELECT,
  PENDING: new PendingContext(),
  /** Positional arguments as SELECT, keyword arguments as EVAL. */
  MIXED: new MixedContext(SELECT, EVAL),
} as const;

function indexSequence(seq: readonly unknown[] | string, index: number, level: number): unknown {
  if (!Number.isInteger(index)) {
    throw new ResolutionError(index, level, 'index is not an integer');
  }
  const at = index < 0 ? seq.length + index : index;
  if (at < 0 || at >= seq.length) {
    throw new ResolutionError(index, level, `index out of range for length ${seq.length}`);
  }
  return seq[at];
}

function isPropertyKey(key: unknown): key is PropertyKey {
  return typeof key === 'string' || typeof key === 'number' || typeof key === 'symbol';
}
