/* Instantiation
 *
 * Builds instances of classes from loosely typed argument lists, by class or
 * by name. Signature lookup goes in three rounds:
 *  - the signature that worked last time for this class (a hint only)
 *  - a declared signature whose parameter types equal the runtime types of
 *    the arguments
 *  - the first signature of matching arity the converter can coerce every
 *    argument to
 *
 * The cache belongs to the context, not the process, so unrelated callers
 * never see each other's entries. Losing an entry only costs a resolution.
 */
import { defaultConverter, type Converter } from '../core/converter.js';
import { ConstructorCache } from '../core/constructor-cache.js';
import { runtimeTypeOf, typeName } from '../core/type-ref.js';
import { InstantiationError } from '../errors/errors.js';
import { childLogger } from '../logging/logger.js';
import { StaticTypeRegistry } from '../registry/static-registry.js';
import type { Constructor, ConstructorDescriptor, InstantiationOptions } from '../types/types.js';
import { classOf, constructorsOf } from './introspection.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for instrumentation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

const log = childLogger({ subsystem: 'instantiation' });

function thrownTypeName(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return classOf(value)?.name ?? 'Object';
  return typeof value;
}

export class InstantiationContext {
  private cache = new ConstructorCache();
  private readonly converter: Converter;
  private readonly types = new Map<string, Constructor>();
  private readonly hook?: (className: string, durationNs: number) => void;

  constructor(options: InstantiationOptions = {}) {
    this.converter = options.converter ?? defaultConverter;
    this.hook = options.onInstantiate;
    for (const type of options.types ?? []) this.types.set(type.name, type);
  }

  /**
   * Create an instance of `type` (or of the class registered under that
   * name) from `args`.
   *
   * An Error thrown by the constructor propagates unchanged; any other
   * thrown value is wrapped in an InstantiationError.
   *
   * @throws InstantiationError when the class is unknown or no signature fits
   */
  instantiate<T>(type: Constructor<T>, ...args: unknown[]): T;
  instantiate(typeName: string, ...args: unknown[]): unknown;
  instantiate(typeOrName: Constructor | string, ...args: unknown[]): unknown {
    const type = typeof typeOrName === 'string' ? this.resolveType(typeOrName, args) : typeOrName;

    const cached = this.cache.get(type);
    if (cached) {
      const converted = this.converter.convertAll(args, cached.parameterTypes);
      if (converted.ok) {
        try {
          return this.construct(cached, converted.value);
        } catch (error) {
          // Stale hint; full resolution below decides what the caller sees.
          log.debug({ err: error, className: type.name }, 'cached constructor failed');
        }
      }
    }

    const signatures = constructorsOf(type);
    const argTypes = args.map(runtimeTypeOf);
    const exact = signatures.find(
      (s) =>
        s.parameterTypes.length === args.length &&
        s.parameterTypes.every((t, i) => t === argTypes[i])
    );
    if (exact) {
      this.cache.prime(exact);
      return this.construct(exact, args);
    }

    let lastFailure: unknown;
    for (const signature of signatures) {
      if (signature.parameterTypes.length !== args.length) continue;
      const converted = this.converter.convertAll(args, signature.parameterTypes);
      if (!converted.ok) {
        lastFailure = converted.error;
        continue;
      }
      this.cache.prime(signature);
      return this.construct(signature, converted.value);
    }

    throw new InstantiationError(
      type.name,
      argumentTypeNames(args),
      `no public constructor accepts ${args.length} argument(s) of these types`,
      { cause: lastFailure }
    );
  }

  /** Signature that last worked for `type`, if any. */
  cachedConstructor(type: Constructor): ConstructorDescriptor | undefined {
    return this.cache.get(type);
  }

  clearCache(): void {
    this.cache = new ConstructorCache();
  }

  private resolveType(name: string, args: readonly unknown[]): Constructor {
    const type = this.types.get(name) ?? StaticTypeRegistry.findByName(name);
    if (!type) {
      throw new InstantiationError(name, argumentTypeNames(args), `class ${name} can not be found`);
    }
    return type;
  }

  private construct(descriptor: ConstructorDescriptor, args: readonly unknown[]): unknown {
    const type = descriptor.declaringType;
    return this.instrumentSync(type.name, () => {
      try {
        return new type(...args);
      } catch (error) {
        if (error instanceof Error) throw error;
        throw new InstantiationError(
          type.name,
          argumentTypeNames(args),
          `exception in constructor: ${thrownTypeName(error)}: ${String(error)}`,
          { cause: error }
        );
      }
    });
  }

  private instrumentSync<T>(className: string, execute: () => T): T {
    const hook = this.hook;
    if (!hook) return execute();

    const start = nowMs();
    try {
      return execute();
    } finally {
      hook(className, toNs(nowMs() - start));
    }
  }
}

function argumentTypeNames(args: readonly unknown[]): string[] {
  return args.map((arg) => typeName(runtimeTypeOf(arg)));
}
