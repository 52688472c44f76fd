import { describe, it, expect } from 'vitest';
import { Context, ContextBase, EvalContext, MixedContext, PendingContext } from './context.js';
import { ResolutionError } from './errors.js';
import { ref } from './nodes.js';

class UpperCaseContext extends EvalContext {
  override readonly name: string = 'upper';

  override getattr(parent: unknown, key: PropertyKey, level: number): unknown {
    return super.getattr(parent, typeof key === 'string' ? key.toUpperCase() : key, level);
  }
}

describe('EVAL context', () => {
  it('reads properties and subscripts', () => {
    expect(Context.EVAL.getattr({ a: 1 }, 'a', 1)).toBe(1);
    expect(Context.EVAL.getattr('abc', 'length', 1)).toBe(3);
    expect(Context.EVAL.getitem({ b: 2 }, 'b', 1)).toBe(2);
    expect(Context.EVAL.getitem(new Map([['k', 9]]), 'k', 1)).toBe(9);
    expect(Context.EVAL.getitem('abc', 1, 1)).toBe('b');
  });

  it('counts negative indexes from the end', () => {
    expect(Context.EVAL.getitem([1, 2, 3], -1, 1)).toBe(3);
  });

  it('names key and level when a key is missing', () => {
    expect(() => Context.EVAL.getattr({ a: 1 }, 'b', 2)).toThrow(
      new ResolutionError('b', 2, 'no such attribute'),
    );
    expect(() => Context.EVAL.getattr({ a: 1 }, 'b', 2)).toThrow('Cannot resolve "b" at level 2: no such attribute');
  });

  it('fails on a null parent and on out-of-range indexes', () => {
    expect(() => Context.EVAL.getattr(null, 'a', 1)).toThrow('Cannot resolve "a" at level 1: parent is null');
    expect(() => Context.EVAL.getitem([1], 5, 3)).toThrow('Cannot resolve 5 at level 3: index out of range for length 1');
    expect(() => Context.EVAL.getitem(new Map(), 'k', 1)).toThrow(ResolutionError);
  });
});

describe('SELECT context', () => {
  it('returns the key whatever the parent is', () => {
    expect(Context.SELECT.getattr({ a: 1 }, 'a', 1)).toBe('a');
    expect(Context.SELECT.getattr(undefined, 'missing', 1)).toBe('missing');
    expect(Context.SELECT.getitem(null, 0, 1)).toBe(0);
  });

  it('evaluates subscript expressions with itself', () => {
    const key = Context.SELECT.resolveKey(ref('k'), (node, context) => `${String(node)}@${context.name}`);
    expect(key).toBe('f.k@select');
    expect(Context.SELECT.resolveKey('plain', () => 'unused')).toBe('plain');
  });
});

describe('PENDING context', () => {
  it('is flagged pending and still resolves like EVAL', () => {
    expect(Context.PENDING.pending).toBe(true);
    expect(Context.PENDING.name).toBe('pending');
    expect(Context.PENDING).toBeInstanceOf(PendingContext);
    expect(Context.PENDING.getattr({ a: 1 }, 'a', 1)).toBe(1);
    expect(Context.EVAL.pending).toBe(false);
  });
});

describe('MIXED context', () => {
  it('splits positional and keyword arguments between SELECT and EVAL', () => {
    expect(Context.MIXED).toBeInstanceOf(MixedContext);
    expect(Context.MIXED.argsContext).toBe(Context.SELECT);
    expect(Context.MIXED.kwargsContext).toBe(Context.EVAL);
    expect(Context.EVAL.argsContext).toBe(Context.EVAL);
  });

  it('does not resolve references itself', () => {
    expect(() => Context.MIXED.getattr({ a: 1 }, 'a', 1)).toThrow(
      'Cannot resolve "a" at level 1: the mixed context only applies to call arguments',
    );
  });
});

describe('context meta', () => {
  it('merges overrides for the scope and restores them afterwards', () => {
    const ctx = new EvalContext();
    const seen = ctx.withMeta({ depth: 1 }, () => ctx.withMeta({ label: 'x' }, () => ctx.meta));
    expect(seen).toEqual({ depth: 1, label: 'x' });
    expect(ctx.meta).toEqual({});
  });

  it('restores the previous meta when the scope throws', () => {
    const ctx = new EvalContext();
    ctx.withMeta({ depth: 1 }, () => {
      expect(() =>
        ctx.withMeta({ depth: 2 }, () => {
          throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(ctx.meta).toEqual({ depth: 1 });
    });
    expect(ctx.meta).toEqual({});
  });
});

describe('user-defined contexts', () => {
  it('can override attribute access', () => {
    const ctx: ContextBase = new UpperCaseContext();
    expect(ctx.getattr({ NAME: 'ada' }, 'name', 1)).toBe('ada');
    expect(String(ctx)).toBe('Context<upper>');
  });
});
