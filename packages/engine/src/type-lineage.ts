/**
 * Runtime "types" used as dispatch keys.
 *
 * A dispatch type is a constructor (`Number`, `Array`, a user class, ...) or
 * one of the literals `null` / `undefined`. `Object` sits at the end of every
 * lineage and therefore matches any value.
 */
export type Constructor = abstract new (...args: never[]) => unknown;
export type CallableType = (...args: never[]) => unknown;
export type DispatchType = Constructor | CallableType | null | undefined;

export function typeOf(value: unknown): DispatchType {
  if (value === null) return null;
  switch (typeof value) {
    case 'undefined': return undefined;
    case 'number': return Number;
    case 'string': return String;
    case 'boolean': return Boolean;
    case 'bigint': return BigInt;
    case 'symbol': return Symbol;
    case 'function': return Function;
    default: {
      const proto: unknown = Object.getPrototypeOf(value);
      return constructorOf(proto) ?? Object;
    }
  }
}

/** Most specific first, always ending with `Object`. */
export function typeLineage(type: DispatchType): DispatchType[] {
  const lineage: DispatchType[] = [];
  if (type === null || type === undefined) {
    lineage.push(type);
  } else if (typeof type === 'function') {
    let current: unknown = type;
    while (typeof current === 'function' && current !== Function.prototype) {
      if (current === Object) break;
      if (isDispatchType(current)) lineage.push(current);
      current = Object.getPrototypeOf(current);
    }
  }
  lineage.push(Object);
  return lineage;
}

export function valueLineage(value: unknown): DispatchType[] {
  return typeLineage(typeOf(value));
}

export function typeName(type: DispatchType): string {
  if (type === null) return 'null';
  if (type === undefined) return 'undefined';
  return type.name || '<anonymous>';
}

export function isDispatchType(value: unknown): value is DispatchType {
  return value === null || value === undefined || typeof value === 'function';
}

function constructorOf(proto: unknown): DispatchType | undefined {
  if (proto === null || typeof proto !== 'object') return undefined;
  const ctor: unknown = Reflect.get(proto, 'constructor');
  return typeof ctor === 'function' && isDispatchType(ctor) ? ctor : undefined;
}
