/* Introspection
 *
 * Pure functions over a type's ancestry. Interfaces do not exist at run time
 * in TypeScript, so "implements" and parameter types come from the
 * StaticTypeRegistry (filled by @Implements, @Constructs and @Accepts) and
 * from capability method tables; everything else is read off the prototype
 * chain.
 *
 * The root of every chain (Object / Function.prototype) is never reported.
 */
import { capabilityLineage, capabilityMethods, isCapability, type Capability } from '../core/capability.js';
import { Types, isConstructor } from '../core/type-ref.js';
import { StaticTypeRegistry } from '../registry/static-registry.js';
import type { Constructor, ConstructorDescriptor, MethodDescriptor, TypeRef } from '../types/types.js';

function parentOf(type: Constructor): Constructor | undefined {
  const parent: unknown = Object.getPrototypeOf(type);
  // Function.prototype has no `prototype` object, so the guard ends the walk there.
  return isConstructor(parent) && parent !== Object ? parent : undefined;
}

function unknownSignature(length: number): readonly TypeRef[] {
  return Object.freeze(new Array<TypeRef>(length).fill(Types.Unknown));
}

/**
 * Superclasses of `type`, immediate one first.
 */
export function ancestryOf(type: Constructor): Constructor[] {
  const result: Constructor[] = [];
  for (let parent = parentOf(type); parent; parent = parentOf(parent)) {
    result.push(parent);
  }
  return result;
}

/**
 * Superclasses of `type` that are still `upperBound` or a subclass of it.
 */
export function boundedAncestryOf(type: Constructor, upperBound: Constructor): Constructor[] {
  const result: Constructor[] = [];
  for (let parent = parentOf(type); parent; parent = parentOf(parent)) {
    if (parent !== upperBound && !(parent.prototype instanceof upperBound)) break;
    result.push(parent);
  }
  return result;
}

/**
 * Every capability `type` implements: declared on the class itself, then on
 * each superclass outward, each followed by the capabilities it extends.
 * First-seen order, no duplicates.
 */
export function capabilitiesOf(type: Constructor): Capability[] {
  const result: Capability[] = [];
  for (const t of [type, ...ancestryOf(type)]) {
    for (const declared of StaticTypeRegistry.capabilitiesOf(t)) {
      for (const cap of capabilityLineage(declared)) {
        if (!result.includes(cap)) result.push(cap);
      }
    }
  }
  return result;
}

/**
 * Ancestry, the type itself, then its capabilities.
 */
export function capabilitiesAndAncestryOf(type: Constructor): (Constructor | Capability)[] {
  const result: (Constructor | Capability)[] = [...ancestryOf(type), type];
  for (const cap of capabilitiesOf(type)) {
    if (!result.includes(cap)) result.push(cap);
  }
  return result;
}

export function implementsCapability(type: Constructor, cap: Capability): boolean {
  return capabilitiesOf(type).includes(cap);
}

/**
 * Class of an object, undefined for null-prototype objects.
 */
export function classOf(value: object): Constructor | undefined {
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== 'object' || proto === null) return undefined;
  const ctor: unknown = Reflect.get(proto, 'constructor');
  return isConstructor(ctor) ? ctor : undefined;
}

function isPublicName(name: string): boolean {
  return name !== 'constructor' && !name.startsWith('_');
}

function declaredSignatures(
  from: Constructor,
  name: string,
  fallbackLength: number
): readonly (readonly TypeRef[])[] {
  for (const t of [from, ...ancestryOf(from)]) {
    const signatures = StaticTypeRegistry.methodSignatures(t, name);
    if (signatures.length > 0) return signatures;
  }
  return [unknownSignature(fallbackLength)];
}

function describeSignatures(
  name: string,
  declaringType: Constructor | Capability,
  signatures: readonly (readonly TypeRef[])[],
  arity: number
): MethodDescriptor[] {
  return signatures
    .filter((parameterTypes) => parameterTypes.length === arity)
    .map((parameterTypes) => Object.freeze({ name, declaringType, parameterTypes }));
}

/**
 * Public method signatures named `name` taking exactly `arity` parameters.
 *
 * On a class the most-derived definition wins; overloads declared with
 * @Accepts() come back as separate descriptors. On a capability the nearest
 * declaration in its lineage is used.
 */
export function methodsByNameAndArity(
  type: Constructor | Capability,
  name: string,
  arity: number
): MethodDescriptor[] {
  if (!isPublicName(name)) return [];

  if (isCapability(type)) {
    const found = capabilityMethods(type).get(name);
    return found ? describeSignatures(name, found.declaringType, [found.parameterTypes], arity) : [];
  }

  for (const t of [type, ...ancestryOf(type)]) {
    const own = Object.getOwnPropertyDescriptor(t.prototype, name);
    if (!own) continue;
    if (typeof own.value !== 'function') return [];
    const fn: unknown = own.value;
    const length = typeof fn === 'function' ? fn.length : 0;
    return describeSignatures(name, t, declaredSignatures(t, name, length), arity);
  }
  return [];
}

/**
 * Like {@link methodsByNameAndArity}, for a live object: function-valued own
 * properties (object literals, arrow-function class fields) come first.
 */
export function instanceMethodsByNameAndArity(
  target: object,
  name: string,
  arity: number
): MethodDescriptor[] {
  if (!isPublicName(name)) return [];
  const type = classOf(target) ?? Object;
  const own = Object.getOwnPropertyDescriptor(target, name);
  if (own && typeof own.value === 'function') {
    const fn: unknown = own.value;
    const length = typeof fn === 'function' ? fn.length : 0;
    return describeSignatures(name, type, declaredSignatures(type, name, length), arity);
  }
  return type === Object ? [] : methodsByNameAndArity(type, name, arity);
}

/**
 * Declared public constructor signatures of a class.
 */
export function constructorsOf(type: Constructor): ConstructorDescriptor[] {
  const declared = StaticTypeRegistry.constructorsOf(type);
  const signatures = declared.length > 0 ? declared : [unknownSignature(type.length)];
  return signatures.map((parameterTypes) => Object.freeze({ declaringType: type, parameterTypes }));
}
