/**
 * Loose function type for user callables. The method-signature indirection keeps
 * parameters bivariant, so `(data: number[], n: number) => number[]` is accepted.
 */
export type AnyFunction = { bivarianceHack(...args: unknown[]): unknown }['bivarianceHack'];

export type KeywordArgs = Readonly<Record<string, unknown>>;

/** Keyword arguments for a call, passed as the last argument: `mutate(kw({ b: ref('a').mul(2) }))`. */
export class Keywords {
  readonly values: KeywordArgs;

  constructor(values: Record<string, unknown>) {
    this.values = Object.freeze({ ...values });
  }
}

export function kw(values: Record<string, unknown>): Keywords {
  return new Keywords(values);
}

export interface SplitArguments {
  args: readonly unknown[];
  kwargs: KeywordArgs;
  hasKeywords: boolean;
}

export function splitArguments(args: readonly unknown[]): SplitArguments {
  const last = args[args.length - 1];
  if (last instanceof Keywords) {
    return { args: Object.freeze(args.slice(0, -1)), kwargs: last.values, hasKeywords: true };
  }
  return { args: Object.freeze([...args]), kwargs: Object.freeze({}), hasKeywords: false };
}

/** Re-assemble the argument list an implementation receives. */
export function implementationArguments(
  subject: { value: unknown } | undefined,
  args: readonly unknown[],
  kwargs: KeywordArgs,
  hasKeywords: boolean,
): unknown[] {
  const out: unknown[] = subject ? [subject.value, ...args] : [...args];
  if (hasKeywords) out.push({ ...kwargs });
  return out;
}
