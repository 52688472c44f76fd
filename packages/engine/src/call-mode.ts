import type { CallMode, FallbackPolicy } from '@pipesmith/types';
import { CallModeDetectionError } from './errors.js';
import type { KeywordArgs } from './keywords.js';
import { isExpression } from './nodes.js';
import type { Runtime } from './runtime.js';

/** What a resolver can see of one invocation of a registered callable. */
export interface CallSite {
  readonly callable: string;
  readonly args: readonly unknown[];
  readonly kwargs: KeywordArgs;
  readonly hasKeywords: boolean;
  /** Parameter count of the primary implementation, subject included. */
  readonly arity: number;
  isDispatchable(value: unknown): boolean;
}

export interface CallModeResolver {
  /** `undefined` when the mode cannot be told from the call site. */
  detect(site: CallSite): CallMode | undefined;
}

/**
 * Classifies a call by how many arguments it received. One fewer than the
 * implementation takes means the subject is missing (piping); a full list
 * whose first value dispatches means the subject was passed (normal).
 */
export class ArityCallModeResolver implements CallModeResolver {
  detect(site: CallSite): CallMode | undefined {
    if (site.arity === 0) return undefined;
    const given = site.args.length + (site.hasKeywords ? 1 : 0);
    if (given === site.arity - 1) return 'piping';
    if (given >= site.arity && site.args.length > 0) {
      const [first] = site.args;
      if (!isExpression(first) && site.isDispatchable(first)) return 'normal';
    }
    return undefined;
  }
}

const defaultResolver = new ArityCallModeResolver();

export interface ResolveCallModeOptions {
  /** The callable's own policy; the runtime option applies when absent. */
  policy?: FallbackPolicy;
  /** Frames at and above this function are left out of the reported location. */
  entry?: (...args: never[]) => unknown;
}

/** Detecting → Piping | Normal, or Undetermined → fallback policy. */
export function resolveCallMode(site: CallSite, runtime: Runtime, options: ResolveCallModeOptions = {}): CallMode {
  if (runtime.options.assumeAllPiping) return 'piping';

  const detected = (runtime.callModeResolver ?? defaultResolver).detect(site);
  if (detected) return detected;

  const policy = options.policy ?? runtime.options.astFallback;
  switch (policy) {
    case 'piping':
    case 'normal':
      return policy;
    case 'piping-with-warning':
    case 'normal-with-warning': {
      const mode: CallMode = policy === 'piping-with-warning' ? 'piping' : 'normal';
      runtime.warn({
        code: 'CALL_MODE_UNDETERMINED',
        message: `Failed to detect the call mode of \`${site.callable}\`; assuming ${mode} mode`,
        location: callSiteLocation(options.entry),
      });
      return mode;
    }
    case 'raise':
      throw new CallModeDetectionError(site.callable, callSiteLocation(options.entry));
  }
}

/** Best-effort `file:line:column` of the caller of `entry`, from the V8 stack. */
export function callSiteLocation(entry?: (...args: never[]) => unknown): string | undefined {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, entry ?? callSiteLocation);
  const frame = holder.stack?.split('\n').slice(1).find((line) => line.trim().startsWith('at '));
  if (!frame) return undefined;
  const inner = /\((.*)\)\s*$/.exec(frame);
  return inner ? inner[1] : frame.trim().slice(3);
}
