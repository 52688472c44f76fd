import { describe, it, expect, beforeEach } from 'vitest';
import {
  f,
  ref,
  symbol,
  binary,
  unary,
  FunctionCallNode,
  OperatorCallNode,
  PipelineCallNode,
  ReferenceNode,
  applyForeign,
  containsExpression,
} from './nodes.js';
import type { CallTarget } from './nodes.js';
import { kw, splitArguments } from './keywords.js';
import { getRuntime, resetRuntime } from './runtime.js';

const noop: CallTarget = {
  name: 'noop',
  evaluatePipeline: (_node, subject) => subject,
  evaluateFunction: () => undefined,
};

function pipelineCall(...args: unknown[]): PipelineCallNode {
  return new PipelineCallNode(noop, splitArguments(args));
}

describe('expression nodes', () => {
  beforeEach(() => {
    resetRuntime();
  });

  it('renders reference chains as dotted and bracketed paths', () => {
    expect(String(ref('a', 'b'))).toBe('f.a.b');
    expect(String(f.attr('a').item('b'))).toBe("f.a['b']");
    expect(String(symbol('row').item(0))).toBe('row[0]');
  });

  it('tracks reference levels from the root symbol', () => {
    const node = ref('a', 'b', 'c');
    expect(node).toBeInstanceOf(ReferenceNode);
    if (!(node instanceof ReferenceNode)) return;
    expect(node.level).toBe(3);
    expect(node.parent).toBeInstanceOf(ReferenceNode);
  });

  it('restarts the level at 1 on operator and call results', () => {
    expect(ref('a', 'b').add(1).attr('c').level).toBe(1);
    expect(ref('a').call().item(0).level).toBe(1);
    expect(ref('a').add(1).attr('c').attr('d').level).toBe(2);
  });

  it('renders operators infix and prefix', () => {
    expect(String(ref('x').add(1))).toBe('f.x + 1');
    expect(String(ref('x').add(1).mul(2))).toBe('(f.x + 1) * 2');
    expect(String(ref('x').neg())).toBe('-f.x');
    expect(String(unary('!', ref('ok')))).toBe('!f.ok');
  });

  it('builds a new node on every call and never evaluates', () => {
    const base = ref('a');
    const sum = base.add(1);
    expect(sum).not.toBe(base.add(1));
    expect(sum).toBeInstanceOf(OperatorCallNode);
    expect(sum.operands[0]).toBe(base);
  });

  it('rejects subscript keys that are objects', () => {
    expect(() => f.item({})).toThrow(TypeError);
    expect(() => f.item(null)).not.toThrow();
  });

  it('marks a reference passed as a whole call argument as direct', () => {
    const arg = ref('b');
    const call = f.attr('fn').call(arg, [ref('c')]);
    const first = call.args[0];
    expect(first).toBeInstanceOf(ReferenceNode);
    expect(first).not.toBe(arg);
    if (first instanceof ReferenceNode) expect(first.isDirect).toBe(true);
    expect(arg instanceof ReferenceNode && arg.isDirect).toBe(false);
  });

  it('freezes call arguments and renders keywords', () => {
    const call = f.method('get', 'key', kw({ fallback: 0 }));
    expect(Object.isFrozen(call.args)).toBe(true);
    expect(Object.isFrozen(call.kwargs)).toBe(true);
    expect(call.hasKeywords).toBe(true);
    expect(String(call)).toBe("f.get('key', fallback=0)");
  });

  it('flags the active piping operator with a pipeline call on the right', () => {
    expect(binary('>>', [1, 2], pipelineCall()).piping).toBe(true);
    expect(binary('|', [1, 2], pipelineCall()).piping).toBe(false);
    expect(binary('>>', [1, 2], 3).piping).toBe(false);
  });

  it('keeps the piping flag of nodes built before the operator changed', () => {
    const before = ref('data').op('>>', pipelineCall());
    getRuntime().configure({ pipingOperator: '|' });
    const after = ref('data').op('>>', pipelineCall());
    expect(before.piping).toBe(true);
    expect(after.piping).toBe(false);
    expect(ref('data').bitOr(pipelineCall()).piping).toBe(true);
  });

  it('wraps foreign operations in a deferred function call by default', () => {
    const node = ref('x').foreign(Math.max, 10);
    expect(node).toBeInstanceOf(FunctionCallNode);
    expect(String(node)).toBe('max(f.x, 10)');
  });

  it('uses the runtime foreign handler when one is set', () => {
    getRuntime().setForeignHandler((fn, inputs) => new FunctionCallNode(fn, splitArguments([...inputs, 'tagged'])));
    const node = applyForeign(Math.min, [ref('x')]);
    expect(String(node)).toBe("min(f.x, 'tagged')");
  });

  it('finds expressions nested in plain arrays and objects', () => {
    expect(containsExpression([1, { a: ref('x') }])).toBe(true);
    expect(containsExpression(kw({ a: ref('x') }))).toBe(true);
    expect(containsExpression({ a: [1, 2] })).toBe(false);
    expect(containsExpression(new Map([['k', ref('x')]]))).toBe(false);
  });
});
