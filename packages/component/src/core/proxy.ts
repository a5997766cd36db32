/* Proxy
 *
 * A proxy is a frozen object implementing exactly one capability. It has one
 * function per method of the capability (its own and inherited ones) and no
 * state: every call is forwarded as (proxy, method descriptor, arguments) to
 * the dispatch function it was built with, normally Component.invoke.
 *
 * Method descriptors are built once per proxy, so dispatch can key
 * interceptors and invocation on them without string parsing.
 */
import type { MethodDescriptor } from '../types/types.js';
import { capabilityMethods, type Capability } from './capability.js';

export type DispatchFn = (
  proxy: object,
  method: MethodDescriptor,
  args: readonly unknown[]
) => unknown;

/** proxy -> capability it was generated for */
const proxyCapabilities = new WeakMap<object, Capability>();

/**
 * Generate a proxy for `cap` whose calls all go to `dispatch`.
 */
export function createCapabilityProxy<T>(cap: Capability<T>, dispatch: DispatchFn): T {
  const label = `proxy for ${cap.label}`;
  const proto: object = Object.freeze(
    Object.create(null, {
      toString: { value: () => label },
      [Symbol.toStringTag]: { value: cap.label },
    })
  );

  const table: PropertyDescriptorMap = {};
  for (const [name, { declaringType, parameterTypes }] of capabilityMethods(cap)) {
    const method: MethodDescriptor = Object.freeze({ name, declaringType, parameterTypes });
    table[name] = {
      enumerable: true,
      value: (...args: unknown[]) => dispatch(proxy, method, args),
    };
  }

  const proxy: object = Object.freeze(Object.create(proto, table));
  proxyCapabilities.set(proxy, cap);
  // Phantom boundary: the method table above is what makes this a T.
  return proxy as T;
}

/**
 * Capability a proxy was generated for, undefined for anything else.
 */
export function capabilityOfProxy(value: unknown): Capability | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  return proxyCapabilities.get(value);
}

export function isCapabilityProxy(value: unknown): value is object {
  return capabilityOfProxy(value) !== undefined;
}
