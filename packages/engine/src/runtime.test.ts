import { describe, it, expect, vi, afterEach } from 'vitest';
import { FrozenRuntimeError } from './errors.js';
import { createDefaultOperators } from './operators.js';
import { createRuntime, getRuntime, resetRuntime, setRuntime, withRuntime } from './runtime.js';

describe('Runtime', () => {
  afterEach(() => {
    resetRuntime();
  });

  it('starts from the default options', () => {
    expect(createRuntime().options).toEqual({
      astFallback: 'normal-with-warning',
      assumeAllPiping: false,
      pipingOperator: '>>',
    });
  });

  it('applies option patches over the current options', () => {
    const runtime = createRuntime({ options: { astFallback: 'raise' } });
    expect(runtime.configure({ pipingOperator: '|' })).toEqual({
      astFallback: 'raise',
      assumeAllPiping: false,
      pipingOperator: '|',
    });
  });

  it('routes warnings to its logger with a component tag', () => {
    const warn = vi.fn();
    const runtime = createRuntime({ logger: { warn, debug: vi.fn() } });
    runtime.warn({ code: 'AMBIGUOUS_DISPATCH', message: 'two backends' });
    expect(warn).toHaveBeenCalledWith('[dispatch] two backends');

    runtime.dispatch.define('sum', { strategy: 'first-arg-type' });
    runtime.dispatch.register('sum', Number, () => 1, { backend: 'b1' });
    runtime.dispatch.register('sum', Number, () => 2, { backend: 'b2' });
    runtime.dispatch.resolve('sum', Number);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('refuses changes once frozen', () => {
    const runtime = createRuntime().freeze();
    expect(runtime.isFrozen).toBe(true);
    expect(() => runtime.configure({ assumeAllPiping: true })).toThrow(FrozenRuntimeError);
    expect(() => runtime.useOperators(createDefaultOperators())).toThrow('Cannot replace the operator registry: runtime is frozen');
    expect(() => runtime.dispatch.define('sum', { strategy: 'first-arg-type' })).toThrow(FrozenRuntimeError);
  });

  it('clones into an isolated, mutable copy', () => {
    const original = createRuntime({ options: { pipingOperator: '|' } });
    original.dispatch.define('sum', { strategy: 'first-arg-type' });
    original.freeze();

    const copy = original.clone();
    expect(copy.isFrozen).toBe(false);
    expect(copy.options.pipingOperator).toBe('|');
    copy.dispatch.register('sum', Number, () => 1);
    expect(copy.dispatch.entries('sum')).toHaveLength(1);
    expect(original.dispatch.entries('sum')).toHaveLength(0);
  });

  it('swaps the active runtime and restores it, also after a throw', () => {
    const before = getRuntime();
    const scoped = createRuntime();
    expect(withRuntime(scoped, () => getRuntime())).toBe(scoped);
    expect(() =>
      withRuntime(scoped, () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(getRuntime()).toBe(before);

    const replaced = createRuntime();
    expect(setRuntime(replaced)).toBe(before);
    expect(getRuntime()).toBe(replaced);
  });

  it('resets to a fresh runtime', () => {
    getRuntime().configure({ assumeAllPiping: true });
    const fresh = resetRuntime();
    expect(fresh.options.assumeAllPiping).toBe(false);
    expect(getRuntime()).toBe(fresh);
  });
});
