import type { Logger } from 'pino';

import type { Capability } from '../core/capability.js';
import type { Converter } from '../core/converter.js';
import type { PrimitiveType } from '../core/type-ref.js';

/**
 * Generic constructor signature used throughout the component core.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Anything a parameter can be declared as.
 *
 *   - a primitive type from {@link Types}
 *   - a capability (runtime stand-in for an interface)
 *   - a class
 */
export type TypeRef = PrimitiveType | Capability | Constructor;

/**
 * One callable signature discovered on a class or a capability.
 *
 * Overloads declared with `@Accepts()` show up as separate descriptors that
 * share a name.
 */
export interface MethodDescriptor {
  readonly name: string;
  /** Most-derived class defining the method, or the capability listing it */
  readonly declaringType: Constructor | Capability;
  readonly parameterTypes: readonly TypeRef[];
}

/** One declared public constructor signature of a class. */
export interface ConstructorDescriptor {
  readonly declaringType: Constructor;
  readonly parameterTypes: readonly TypeRef[];
}

/**
 * Success-or-failure value used wherever a call may fail and the failure has
 * to travel to a single unwrapping point.
 */
export type Result<T, E = unknown> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Handler given first refusal on every call mediated for a capability.
 *
 * It receives the real implementation and decides whether and how to
 * forward the call.
 */
export interface InvocationInterceptor {
  invoke(target: object, method: MethodDescriptor, args: readonly unknown[]): unknown;
}

export type InterceptorFn = (
  target: object,
  method: MethodDescriptor,
  args: readonly unknown[]
) => unknown;

/**
 * Peer-resolution service. Components only ever ask it for a proxy of a
 * named peer under a given capability.
 */
export interface Facade {
  getProxy<T>(componentId: string, capability: Capability<T>): T;
}

/** Flat key/value configuration handed to {@link Component.setProperties}. */
export type Properties = Readonly<Record<string, string>>;

/**
 * Options accepted by the Component constructor.
 */
export interface ComponentOptions {
  /**
   * Extra capabilities for implementations whose class declares none,
   * typically object literals.
   */
  capabilities?: readonly Capability[];

  /** Coercion used for property injection and by-name invocation. */
  converter?: Converter;

  /**
   * Logger for wiring diagnostics. Defaults to a child of the package logger
   * bound to the implementation's class name.
   */
  logger?: Logger;
}

/**
 * Options accepted by {@link InstantiationContext}.
 */
export interface InstantiationOptions {
  /** Classes that may be instantiated by name, in addition to decorated ones. */
  types?: readonly Constructor[];

  converter?: Converter;

  /**
   * Optional hook invoked after a class is constructed.
   *
   * Receives the class name and the construction duration in nanoseconds.
   */
  onInstantiate?: (className: string, durationNs: number) => void;
}

export type { PrimitiveType };
