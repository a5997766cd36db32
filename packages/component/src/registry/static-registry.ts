import type { Capability } from '../core/capability.js';
import type { Constructor, TypeRef } from '../types/types.js';

/**
 * Mutable record storing decorator metadata for a single class.
 *
 * Fields:
 * - capabilities: directly implemented capabilities from @Implements()
 * - constructors: declared constructor signatures from @Constructs()
 * - methods: method name → declared signatures from @Accepts()
 */
type TypeRecord = {
  capabilities: Capability[];
  constructors: (readonly TypeRef[])[];
  methods: Map<string, (readonly TypeRef[])[]>;
};

/**
 * Fields:
 * - types: WeakMap so unused classes can be garbage collected
 * - keys: strong references for lookups by name, until reset
 */
type TypeBag = {
  types: WeakMap<Constructor, TypeRecord>;
  keys: Set<Constructor>;
};

/**
 * Global symbol for storing the registry on globalThis.
 *
 * Keeps a single registry per process even if the module is bundled more
 * than once.
 */
const GLOBAL_SYMBOL = Symbol.for('hinge.staticTypeRegistry');

const EMPTY_CAPABILITIES: readonly Capability[] = Object.freeze([]);
const EMPTY_SIGNATURES: readonly (readonly TypeRef[])[] = Object.freeze([]);

function createBag(): TypeBag {
  return { types: new WeakMap(), keys: new Set() };
}

function isTypeBag(value: unknown): value is TypeBag {
  return (
    typeof value === 'object' &&
    value !== null &&
    (value as TypeBag).types instanceof WeakMap &&
    (value as TypeBag).keys instanceof Set
  );
}

function ensureBag(): TypeBag {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (isTypeBag(existing)) return existing;
  const fresh = createBag();
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

/**
 * Global registry for decorator metadata.
 *
 * TypeScript erases interfaces and parameter types, so @Implements(),
 * @Constructs() and @Accepts() record them here at module load time.
 * Introspection reads them back.
 *
 * Signatures are stored in source order: decorators run bottom-up, so every
 * registration is prepended.
 */
export class StaticTypeRegistry {
  static registerCapabilities(target: Constructor, capabilities: readonly Capability[]): void {
    const rec = this.recordFor(target);
    for (const cap of capabilities) {
      if (!rec.capabilities.includes(cap)) rec.capabilities.push(cap);
    }
  }

  static registerConstructor(target: Constructor, parameterTypes: readonly TypeRef[]): void {
    this.recordFor(target).constructors.unshift(Object.freeze([...parameterTypes]));
  }

  static registerMethod(
    target: Constructor,
    methodName: string,
    parameterTypes: readonly TypeRef[]
  ): void {
    const rec = this.recordFor(target);
    let signatures = rec.methods.get(methodName);
    if (!signatures) {
      signatures = [];
      rec.methods.set(methodName, signatures);
    }
    signatures.unshift(Object.freeze([...parameterTypes]));
  }

  /** Capabilities declared directly on `target` (not its ancestors). */
  static capabilitiesOf(target: Constructor): readonly Capability[] {
    return ensureBag().types.get(target)?.capabilities ?? EMPTY_CAPABILITIES;
  }

  /** Declared constructor signatures, empty when none were declared. */
  static constructorsOf(target: Constructor): readonly (readonly TypeRef[])[] {
    return ensureBag().types.get(target)?.constructors ?? EMPTY_SIGNATURES;
  }

  /** Declared signatures of a method defined on `target` itself. */
  static methodSignatures(target: Constructor, methodName: string): readonly (readonly TypeRef[])[] {
    return ensureBag().types.get(target)?.methods.get(methodName) ?? EMPTY_SIGNATURES;
  }

  static has(target: Constructor): boolean {
    return ensureBag().types.has(target);
  }

  /**
   * Find a decorated class by its name. The most recently decorated class
   * wins when names collide.
   */
  static findByName(name: string): Constructor | undefined {
    let found: Constructor | undefined;
    for (const ctor of ensureBag().keys) {
      if (ctor.name === name) found = ctor;
    }
    return found;
  }

  /**
   * Test helper to reset the registry.
   *
   * ⚠️ Classes decorated before the reset lose their metadata.
   */
  static resetForTests(): void {
    Reflect.set(globalThis, GLOBAL_SYMBOL, createBag());
  }

  private static recordFor(target: Constructor): TypeRecord {
    const bag = ensureBag();
    let rec = bag.types.get(target);
    if (!rec) {
      rec = { capabilities: [], constructors: [], methods: new Map() };
      bag.types.set(target, rec);
      bag.keys.add(target);
    }
    return rec;
  }
}
