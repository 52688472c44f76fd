import { Context } from './context.js';
import type { ContextBase } from './context.js';
import { PipelineConsumedError } from './errors.js';
import { Evaluator } from './evaluator.js';
import { PipelineCallNode } from './nodes.js';
import { getRuntime } from './runtime.js';

// Pipeline calls that have been fed a subject. Evaluation nested inside an expression does not count.
const consumed = new WeakSet<PipelineCallNode>();

/** Evaluate a pipeline call against `subject`; each call can be fed once. */
export function feed(call: PipelineCallNode, subject: unknown, context: ContextBase = Context.EVAL): unknown {
  if (consumed.has(call)) throw new PipelineConsumedError(call.callee.name);
  consumed.add(call);
  return new Evaluator(getRuntime()).evaluate(call, subject, context);
}

export function isConsumed(call: PipelineCallNode): boolean {
  return consumed.has(call);
}

/**
 * Thread `subject` through pipeline calls from left to right:
 * `pipe(data, mutate(kw({ b: ref('a').mul(2) })))`.
 */
export function pipe(subject: unknown, ...calls: unknown[]): unknown {
  let value = subject;
  for (const [i, call] of calls.entries()) {
    if (!(call instanceof PipelineCallNode)) {
      throw new TypeError(
        `pipe() step ${i} is not a pipeline call (got ${describe(call)}); ` +
          'call a pipeable callable without its subject, or use .piped()',
      );
    }
    value = feed(call, value);
  }
  return value;
}

/**
 * Run `fn` with `subject` as the ambient subject: piping-mode calls and
 * deferred function calls made inside evaluate against it immediately.
 */
export function withSubject<T>(subject: unknown, fn: () => T): T {
  const runtime = getRuntime();
  runtime.pushSubject(subject);
  try {
    return fn();
  } finally {
    runtime.popSubject();
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
