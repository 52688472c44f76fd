import { describe, it, expect, vi, beforeEach } from 'vitest';
import { registerVerb } from './callable.js';
import { PipelineConsumedError } from './errors.js';
import { evaluate } from './evaluator.js';
import { kw } from './keywords.js';
import { PipelineCallNode, ref } from './nodes.js';
import { feed, isConsumed, pipe, withSubject } from './piping.js';
import { getRuntime, resetRuntime } from './runtime.js';

function defineVerbs() {
  const mutate = registerVerb(
    (data: Record<string, unknown>, values: Record<string, unknown>) => ({ ...data, ...values }),
    { name: 'mutate' },
  );
  const keys = registerVerb((data: Record<string, unknown>) => Object.keys(data), { name: 'keys' });
  return { mutate, keys };
}

function asPipelineCall(value: unknown): PipelineCallNode {
  if (!(value instanceof PipelineCallNode)) throw new Error('expected a pipeline call');
  return value;
}

describe('pipe', () => {
  beforeEach(() => {
    resetRuntime({ logger: { warn: vi.fn(), debug: vi.fn() } });
  });

  it('threads the subject through each call in order', () => {
    const { mutate, keys } = defineVerbs();
    const result = pipe({ a: 1 }, mutate(kw({ b: ref('a').add(1) })), mutate(kw({ c: ref('b').mul(10) })), keys());
    expect(result).toEqual(['a', 'b', 'c']);
  });

  it('returns the subject when there is nothing to pipe through', () => {
    const subject = { a: 1 };
    expect(pipe(subject)).toBe(subject);
  });

  it('rejects steps that are not pipeline calls', () => {
    expect(() => pipe(1, (x: number) => x + 1)).toThrow(
      'pipe() step 0 is not a pipeline call (got function); call a pipeable callable without its subject, or use .piped()',
    );
    expect(() => pipe(1, ref('a'))).toThrow('pipe() step 0 is not a pipeline call (got ReferenceNode)');
  });

  it('consumes a pipeline call once', () => {
    const { mutate } = defineVerbs();
    const call = mutate(kw({ b: 2 }));

    expect(pipe({ a: 1 }, call)).toEqual({ a: 1, b: 2 });
    expect(() => pipe({ a: 5 }, call)).toThrow(PipelineConsumedError);
    expect(() => pipe({ a: 5 }, call)).toThrow('Pipeline call `mutate` has already been evaluated against a subject');
  });

  it('does not consume calls evaluated inside expressions', () => {
    const { mutate } = defineVerbs();
    const call = mutate(kw({ b: 2 }));
    expect(evaluate(call, { a: 1 })).toEqual({ a: 1, b: 2 });
    expect(evaluate(call, { a: 3 })).toEqual({ a: 3, b: 2 });
    expect(pipe({ a: 4 }, call)).toEqual({ a: 4, b: 2 });
  });
});

describe('feed', () => {
  beforeEach(() => {
    resetRuntime({ logger: { warn: vi.fn(), debug: vi.fn() } });
  });

  it('evaluates one pipeline call and marks it consumed', () => {
    const { mutate } = defineVerbs();
    const call = asPipelineCall(mutate(kw({ b: 1 })));

    expect(isConsumed(call)).toBe(false);
    expect(feed(call, { a: 0 })).toEqual({ a: 0, b: 1 });
    expect(isConsumed(call)).toBe(true);
    expect(() => feed(call, { a: 0 })).toThrow(PipelineConsumedError);
  });
});

describe('withSubject', () => {
  beforeEach(() => {
    resetRuntime({ logger: { warn: vi.fn(), debug: vi.fn() } });
  });

  it('restores the previous ambient subject, also after a throw', () => {
    const runtime = getRuntime();
    withSubject('outer', () => {
      expect(() =>
        withSubject('inner', () => {
          expect(runtime.ambientSubject()).toEqual({ value: 'inner' });
          throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(runtime.ambientSubject()).toEqual({ value: 'outer' });
    });
    expect(runtime.ambientSubject()).toBeUndefined();
  });
});
