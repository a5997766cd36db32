import { StaticTypeRegistry } from '../registry/static-registry.js';
import type { Constructor, TypeRef } from '../types/types.js';

/**
 * Declares one public constructor signature of a class.
 *
 * Repeat the decorator to declare overloads; instantiation tries them in
 * source order. A class without any declaration gets a single signature of
 * `ctor.length` parameters typed `Types.Unknown`.
 *
 * @example
 * ```typescript
 * @Constructs(Types.Number)
 * @Constructs(Types.String, Types.Number)
 * class Endpoint {
 *   constructor(hostOrPort: string | number, port?: number) { ... }
 * }
 * ```
 */
export function Constructs(...parameterTypes: TypeRef[]): ClassDecorator {
  return (target) => {
    const constructor = target as unknown as Constructor;
    StaticTypeRegistry.registerConstructor(constructor, parameterTypes);
  };
}
