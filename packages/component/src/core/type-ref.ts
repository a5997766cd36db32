import type { Constructor, TypeRef } from '../types/types.js';
import { extendsCapability, isCapability } from './capability.js';
import { capabilityOfProxy } from './proxy.js';

declare const PRIMITIVE_BRAND: unique symbol;

export type PrimitiveName =
  | 'string'
  | 'number'
  | 'boolean'
  | 'bigint'
  | 'symbol'
  | 'object'
  | 'function'
  | 'unknown';

/**
 * Runtime descriptor for a non-class parameter type.
 *
 * @template T - Value type the descriptor stands for
 */
export interface PrimitiveType<T = unknown> {
  readonly kind: 'primitive';
  readonly name: PrimitiveName;
  readonly [PRIMITIVE_BRAND]: T;
}

function primitive<T>(name: PrimitiveName): PrimitiveType<T> {
  return Object.freeze({ kind: 'primitive', name }) as PrimitiveType<T>;
}

/**
 * Primitive parameter types.
 *
 * `Unknown` is the root: every value and every type is assignable to it.
 * `Object` accepts any non-null object, proxies included.
 */
export const Types = {
  String: primitive<string>('string'),
  Number: primitive<number>('number'),
  Boolean: primitive<boolean>('boolean'),
  BigInt: primitive<bigint>('bigint'),
  Symbol: primitive<symbol>('symbol'),
  Object: primitive<object>('object'),
  Function: primitive<(...args: never[]) => unknown>('function'),
  Unknown: primitive<unknown>('unknown'),
} as const;

export function isPrimitiveType(x: unknown): x is PrimitiveType {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as PrimitiveType).kind === 'primitive' &&
    typeof (x as PrimitiveType).name === 'string'
  );
}

export function isConstructor(x: unknown): x is Constructor {
  return typeof x === 'function' && typeof (x as { prototype?: unknown }).prototype === 'object';
}

/**
 * Exact runtime type of a value.
 *
 *  - primitives map to their {@link Types} entry (`null`/`undefined` to Unknown)
 *  - a generated proxy maps to its capability
 *  - a class instance maps to its class
 *  - plain and null-prototype objects map to Types.Object
 */
export function runtimeTypeOf(value: unknown): TypeRef {
  switch (typeof value) {
    case 'string':
      return Types.String;
    case 'number':
      return Types.Number;
    case 'boolean':
      return Types.Boolean;
    case 'bigint':
      return Types.BigInt;
    case 'symbol':
      return Types.Symbol;
    case 'function':
      return Types.Function;
    case 'undefined':
      return Types.Unknown;
  }
  if (value === null) return Types.Unknown;

  const cap = capabilityOfProxy(value);
  if (cap) return cap;

  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== 'object' || proto === null) return Types.Object;
  const ctor: unknown = Reflect.get(proto, 'constructor');
  if (!isConstructor(ctor) || ctor === Object) return Types.Object;
  return ctor;
}

/**
 * Type-to-type assignability: can a value of `source` be passed where
 * `target` is declared?
 */
export function isAssignable(target: TypeRef, source: TypeRef): boolean {
  if (target === source) return true;
  if (isPrimitiveType(target)) {
    if (target.name === 'unknown') return true;
    if (target.name === 'object') {
      return isCapability(source) || isConstructor(source) || source === Types.Object;
    }
    return false;
  }
  if (isCapability(target)) {
    return isCapability(source) && extendsCapability(source, target);
  }
  if (isConstructor(source)) {
    return source.prototype instanceof target;
  }
  return false;
}

/**
 * Label of a type for diagnostics.
 */
export function typeName(ref: TypeRef): string {
  if (isPrimitiveType(ref)) return ref.name;
  if (isCapability(ref)) return ref.label;
  return ref.name || 'anonymous';
}
