import type { ExpressionInspection } from '@pipesmith/types';
import { Keywords } from './keywords.js';
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

const MAX_DEPTH = 256;

/**
 * Static walk of an expression before it is fed a subject: which top-level
 * keys it reads, which callables it uses, and whether it still holds a
 * pipeline call waiting for a subject.
 */
export function inspectExpression(expression: unknown, runtime: Runtime = getRuntime()): ExpressionInspection {
  const errors: ExpressionInspection['errors'] = [];
  const references = new Set<string>();
  const callablesUsed = new Set<string>();
  let hasPiping = false;
  let complexity = 0;

  function walkValue(value: unknown, path: string, depth: number): void {
    if (value instanceof Expression) {
      walk(value, path, depth);
    } else if (value instanceof Keywords) {
      walkValue(value.values, path, depth);
    } else if (Array.isArray(value)) {
      value.forEach((v, i) => walkValue(v, `${path}[${i}]`, depth + 1));
    } else if (isPlainObject(value)) {
      for (const [k, v] of Object.entries(value)) walkValue(v, `${path}.${k}`, depth + 1);
    }
  }

  function walk(node: Expression, path: string, depth: number): void {
    if (depth > MAX_DEPTH) {
      errors.push({ path, error: `Maximum expression depth (${MAX_DEPTH}) exceeded` });
      return;
    }

    complexity++;

    if (node instanceof SymbolNode) return;

    if (node instanceof ReferenceNode) {
      if (node.parent instanceof SymbolNode) references.add(String(node.key));
      walk(node.parent, `${path}.parent`, depth + 1);
      walkValue(node.key, `${path}.key`, depth + 1);
      return;
    }

    if (node instanceof OperatorCallNode) {
      if (!runtime.operators.has(node.op)) {
        errors.push({ path, error: `Unknown operator: ${node.op}` });
      }
      if (node.piping) hasPiping = true;
      node.operands.forEach((o, i) => walkValue(o, `${path}.operands[${i}]`, depth + 1));
      return;
    }

    if (node instanceof PipelineCallNode || node instanceof FunctionCallNode) {
      if (node instanceof PipelineCallNode) hasPiping = true;
      const { callee } = node;
      if (isCallTarget(callee)) {
        callablesUsed.add(callee.name);
        if (!runtime.dispatch.has(callee.name)) {
          errors.push({ path, error: `Callable \`${callee.name}\` is not registered in the active runtime` });
        }
      } else if (callee instanceof Expression) {
        walk(callee, `${path}.callee`, depth + 1);
      } else {
        callablesUsed.add(callee.name || '<anonymous>');
      }
      node.args.forEach((a, i) => walkValue(a, `${path}.args[${i}]`, depth + 1));
      for (const [k, v] of Object.entries(node.kwargs)) walkValue(v, `${path}.kwargs.${k}`, depth + 1);
    }
  }

  walkValue(expression, 'root', 0);

  return {
    valid: errors.length === 0,
    errors,
    references: Array.from(references),
    callables_used: Array.from(callablesUsed),
    has_piping: hasPiping,
    estimated_complexity: complexity,
  };
}
