import type { TypeRef } from '../types/types.js';

/**
 * Phantom type brand for compile-time type safety.
 * Associates a capability with the interface it stands for.
 */
declare const CAPABILITY_BRAND: unique symbol;

/**
 * Keys of `T` whose values are functions.
 */
export type MethodKeys<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] &
  string;

/**
 * Parameter types per method. Methods inherited from an extended capability
 * may be left out.
 */
export type MethodTable<T> = { readonly [K in MethodKeys<T>]?: readonly TypeRef[] };

/**
 * Runtime stand-in for an interface.
 *
 * TypeScript erases interfaces, so every interface a component exposes is
 * described once by a capability: its method table and the capabilities it
 * extends. Proxies, interception and setter matching all key on it.
 *
 * @template T - The interface this capability describes
 */
export interface Capability<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'capability';

  /** Unique identifier (cap_1, cap_2, etc.) */
  readonly id: string;

  /** Human-readable label for diagnostics */
  readonly label: string;

  /** Methods declared by this capability itself, name -> parameter types */
  readonly methods: ReadonlyMap<string, readonly TypeRef[]>;

  /** Directly extended capabilities, in declaration order */
  readonly parents: readonly Capability[];

  /** Phantom type brand */
  readonly [CAPABILITY_BRAND]: T;
}

export interface CapabilityOptions {
  extends?: readonly Capability[];
}

let _capCounter = 0;

/**
 * Create a new capability.
 *
 * @example
 * ```typescript
 * interface Greeter { greet(name: string): string }
 * const GreeterC = capability<Greeter>('Greeter', { greet: [Types.String] });
 * ```
 */
export function capability<T = unknown>(
  label: string,
  methods: MethodTable<T> = {},
  options: CapabilityOptions = {}
): Capability<T> {
  const parents = options.extends ?? [];
  for (const parent of parents) {
    if (!isCapability(parent)) {
      throw new Error(`Capability '${label}' can only extend capabilities.`);
    }
  }
  const table = new Map<string, readonly TypeRef[]>();
  for (const [name, types] of Object.entries<readonly TypeRef[] | undefined>(methods)) {
    if (types) table.set(name, Object.freeze([...types]));
  }
  return Object.freeze({
    kind: 'capability',
    id: `cap_${++_capCounter}`,
    label,
    methods: table,
    parents: Object.freeze([...parents]),
  }) as Capability<T>;
}

/**
 * Runtime type guard for capabilities.
 */
export function isCapability(x: unknown): x is Capability {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as Capability).kind === 'capability' &&
    typeof (x as Capability).id === 'string' &&
    (x as Capability).methods instanceof Map
  );
}

/**
 * True when `source` is `target` or extends it, directly or transitively.
 */
export function extendsCapability(source: Capability, target: Capability): boolean {
  if (source === target) return true;
  return source.parents.some((parent) => extendsCapability(parent, target));
}

/**
 * The capability followed by everything it extends, depth first, without
 * duplicates.
 */
export function capabilityLineage(cap: Capability): Capability[] {
  const seen = new Set<Capability>();
  const walk = (c: Capability): void => {
    if (seen.has(c)) return;
    seen.add(c);
    c.parents.forEach(walk);
  };
  walk(cap);
  return [...seen];
}

/**
 * Every method name a proxy for `cap` has to answer, with the capability
 * that declares it. The nearest declaration wins.
 */
export function capabilityMethods(
  cap: Capability
): Map<string, { declaringType: Capability; parameterTypes: readonly TypeRef[] }> {
  const out = new Map<string, { declaringType: Capability; parameterTypes: readonly TypeRef[] }>();
  for (const c of capabilityLineage(cap)) {
    for (const [name, parameterTypes] of c.methods) {
      if (!out.has(name)) out.set(name, { declaringType: c, parameterTypes });
    }
  }
  return out;
}
