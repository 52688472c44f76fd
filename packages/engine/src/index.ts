export {
  Expression,
  SymbolNode,
  ReferenceNode,
  OperatorCallNode,
  FunctionCallNode,
  PipelineCallNode,
  symbol,
  f,
  ref,
  binary,
  unary,
  applyForeign,
  wrapForeignOperation,
  isExpression,
  isCallTarget,
  containsExpression,
} from './nodes.js';
export type { CallTarget, Callee, CallParts, CallNodeOptions, ForeignHandler, ReferenceKind } from './nodes.js';
export { Context, ContextBase, EvalContext, SelectContext, PendingContext, MixedContext } from './context.js';
export type { Meta, KeyEvaluator } from './context.js';
export { OperatorRegistry, createDefaultOperators } from './operators.js';
export type { OperatorHandler } from './operators.js';
export { Evaluator, evaluate, withDeclaredContext } from './evaluator.js';
export type { KeywordContexts, EvaluatedArguments } from './evaluator.js';
export { DispatchRegistry } from './registry.js';
export type { ImplementationEntry, Resolution, GenericDefinition, RegisterOptions, WarningSink } from './registry.js';
export { typeOf, typeLineage, valueLineage, typeName } from './type-lineage.js';
export type { DispatchType, Constructor } from './type-lineage.js';
export { ArityCallModeResolver, resolveCallMode, callSiteLocation } from './call-mode.js';
export type { CallModeResolver, CallSite, ResolveCallModeOptions } from './call-mode.js';
export { Generic, register, registerVerb, registerFunc, unregister } from './callable.js';
export type { Callable, DependentCallable, RegisterCallableOptions } from './callable.js';
export { pipe, feed, isConsumed, withSubject } from './piping.js';
export { inspectExpression } from './inspect.js';
export { Keywords, kw } from './keywords.js';
export type { AnyFunction, KeywordArgs } from './keywords.js';
export { Runtime, getRuntime, setRuntime, resetRuntime, createRuntime, withRuntime } from './runtime.js';
export type { RuntimeConfig } from './runtime.js';
export { loadOptionsFromEnv } from './config.js';
export { createConsoleLogger, formatWarning } from './logger.js';
export type { Logger } from './logger.js';
export {
  PipesmithError,
  ResolutionError,
  DispatchNotFoundError,
  BackendNotFoundError,
  CallModeDetectionError,
  RegistrationError,
  OperatorNotFoundError,
  PipelineConsumedError,
  FrozenRuntimeError,
  VerbArgumentOnlyError,
} from './errors.js';
export type { PipesmithErrorCode } from './errors.js';
