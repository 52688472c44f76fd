import { DEFAULT_BACKEND } from '@pipesmith/types';
import type { DispatchEntrySummary, DispatchStrategy, RuntimeWarning } from '@pipesmith/types';
import type { ContextBase } from './context.js';
import { BackendNotFoundError, DispatchNotFoundError, FrozenRuntimeError, RegistrationError } from './errors.js';
import type { AnyFunction, KeywordArgs } from './keywords.js';
import { typeLineage, typeName, typeOf } from './type-lineage.js';
import type { DispatchType } from './type-lineage.js';

export interface ImplementationEntry {
  readonly type: DispatchType;
  readonly backend: string;
  readonly impl: AnyFunction;
  readonly favored: boolean;
  readonly context: ContextBase | undefined;
  readonly order: number;
}

export interface Resolution {
  readonly impl: AnyFunction;
  readonly context: ContextBase | undefined;
  /** Undefined when the generic's default implementation was selected. */
  readonly entry: ImplementationEntry | undefined;
}

export interface GenericDefinition {
  strategy: DispatchStrategy;
  /** Implementation used when no registered type matches. */
  fallback?: AnyFunction;
  fallbackContext?: ContextBase;
}

export interface RegisterOptions {
  backend?: string;
  favored?: boolean;
  context?: ContextBase;
}

interface GenericTable extends GenericDefinition {
  readonly entries: Map<DispatchType, ImplementationEntry[]>;
  readonly backends: Set<string>;
}

export type WarningSink = (warning: RuntimeWarning) => void;

/**
 * Type-indexed implementations per generic name, with several backends per
 * type. Resolution per type: the hinted backend only, else the favored entry,
 * else the most recently registered one (with an ambiguity warning).
 */
export class DispatchRegistry {
  private readonly generics = new Map<string, GenericTable>();
  private sequence = 0;
  private frozen = false;

  constructor(private readonly onWarning: WarningSink = () => {}) {}

  /** Defining a name again replaces its table. */
  define(name: string, definition: GenericDefinition): void {
    this.assertMutable(`define \`${name}\``);
    this.generics.set(name, { ...definition, entries: new Map(), backends: new Set() });
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  has(name: string): boolean {
    return this.generics.has(name);
  }

  names(): string[] {
    return Array.from(this.generics.keys());
  }

  strategy(name: string): DispatchStrategy {
    return this.table(name).strategy;
  }

  register(
    name: string,
    types: DispatchType | readonly DispatchType[],
    impl: AnyFunction,
    options: RegisterOptions = {},
  ): void {
    this.assertMutable(`register \`${name}\``);
    const table = this.table(name);
    const backend = options.backend ?? DEFAULT_BACKEND;
    const favored = options.favored ?? false;
    const list = isTypeList(types) ? types : [types];

    for (const type of list) {
      const existing = (table.entries.get(type) ?? []).filter((e) => e.backend !== backend);
      const rival = favored ? existing.find((e) => e.favored) : undefined;
      if (rival) {
        throw new RegistrationError(
          `\`${name}\` already has a favored implementation for ${typeName(type)} ` +
            `(backend "${rival.backend}"); cannot also favor backend "${backend}"`,
        );
      }
      existing.push({ type, backend, impl, favored, context: options.context, order: ++this.sequence });
      table.entries.set(type, existing);
    }
    table.backends.add(backend);
  }

  backends(name: string): string[] {
    return Array.from(this.table(name).backends);
  }

  entries(name: string): DispatchEntrySummary[] {
    const out: DispatchEntrySummary[] = [];
    for (const list of this.table(name).entries.values()) {
      for (const e of list) {
        out.push({ type: typeName(e.type), backend: e.backend, favored: e.favored, order: e.order });
      }
    }
    return out.sort((a, b) => a.order - b.order);
  }

  /** Registered implementation for `type` (or an ancestor), without falling back to the default. */
  lookup(name: string, type: DispatchType, backendHint?: string): Resolution | undefined {
    return this.find(name, type, backendHint, true);
  }

  private find(name: string, type: DispatchType, backendHint: string | undefined, warn: boolean): Resolution | undefined {
    const table = this.table(name);
    if (backendHint !== undefined && !table.backends.has(backendHint)) {
      throw new BackendNotFoundError(name, backendHint);
    }
    for (const candidateType of typeLineage(type)) {
      const list = table.entries.get(candidateType);
      if (!list) continue;
      const candidates = backendHint === undefined ? list : list.filter((e) => e.backend === backendHint);
      if (candidates.length > 0) {
        const entry = this.pick(name, candidateType, candidates, warn);
        return { impl: entry.impl, context: entry.context, entry };
      }
    }
    return undefined;
  }

  /** With a backend hint only that backend's entries count; the default implementation is never used then. */
  resolve(name: string, type: DispatchType, backendHint?: string): Resolution {
    return this.lookup(name, type, backendHint) ?? this.defaultResolution(name, [type], backendHint);
  }

  /** Resolve from evaluated argument values according to the generic's strategy. */
  dispatch(name: string, args: readonly unknown[], kwargs: KeywordArgs, backendHint?: string): Resolution {
    const values = dispatchValues(this.table(name).strategy, args, kwargs);
    // first match wins, in argument order
    for (const value of values) {
      const found = this.lookup(name, typeOf(value), backendHint);
      if (found) return found;
    }
    return this.defaultResolution(name, values.map(typeOf), backendHint);
  }

  canDispatch(name: string, value: unknown): boolean {
    return this.table(name).fallback !== undefined || this.find(name, typeOf(value), undefined, false) !== undefined;
  }

  clone(onWarning: WarningSink): DispatchRegistry {
    const copy = new DispatchRegistry(onWarning);
    copy.sequence = this.sequence;
    for (const [name, table] of this.generics) {
      const entries = new Map<DispatchType, ImplementationEntry[]>();
      for (const [type, list] of table.entries) entries.set(type, [...list]);
      copy.generics.set(name, { ...table, entries, backends: new Set(table.backends) });
    }
    return copy;
  }

  private pick(name: string, type: DispatchType, candidates: ImplementationEntry[], warn: boolean): ImplementationEntry {
    const favored = candidates.find((e) => e.favored);
    if (favored) return favored;

    let latest = candidates[0];
    for (const e of candidates) {
      if (e.order > latest.order) latest = e;
    }
    if (warn && candidates.length > 1) {
      const backends = candidates.map((e) => `"${e.backend}"`).join(', ');
      this.onWarning({
        code: 'AMBIGUOUS_DISPATCH',
        message:
          `Multiple implementations of \`${name}\` for type ${typeName(type)} from backends ${backends}; ` +
          `using "${latest.backend}" (most recently registered). Favor one backend or pass a backend explicitly.`,
      });
    }
    return latest;
  }

  private defaultResolution(name: string, types: DispatchType[], backendHint: string | undefined): Resolution {
    if (backendHint !== undefined) throw new BackendNotFoundError(name, backendHint);
    const table = this.table(name);
    if (table.fallback) {
      return { impl: table.fallback, context: table.fallbackContext, entry: undefined };
    }
    return {
      impl: () => {
        throw new DispatchNotFoundError(name, types.map(typeName));
      },
      context: undefined,
      entry: undefined,
    };
  }

  private assertMutable(action: string): void {
    if (this.frozen) throw new FrozenRuntimeError(action);
  }

  private table(name: string): GenericTable {
    const table = this.generics.get(name);
    if (!table) throw new RegistrationError(`Generic \`${name}\` is not defined`);
    return table;
  }
}

export function isTypeList(types: DispatchType | readonly DispatchType[]): types is readonly DispatchType[] {
  return Array.isArray(types);
}

function dispatchValues(strategy: DispatchStrategy, args: readonly unknown[], kwargs: KeywordArgs): unknown[] {
  switch (strategy) {
    case 'first-arg-type': {
      if (args.length > 0) return [args[0]];
      const first = Object.values(kwargs)[0];
      return Object.keys(kwargs).length > 0 ? [first] : [];
    }
    case 'all-positional-types': return [...args];
    case 'all-keyword-types': return Object.values(kwargs);
    case 'all-arg-types': return [...args, ...Object.values(kwargs)];
  }
}
