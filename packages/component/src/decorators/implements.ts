import { isCapability, type Capability } from '../core/capability.js';
import { StaticTypeRegistry } from '../registry/static-registry.js';
import type { Constructor } from '../types/types.js';

/**
 * Declares the capabilities a class implements directly.
 *
 * The runtime counterpart of an `implements` clause. Subclasses inherit the
 * declaration through their ancestry, and capabilities bring along the ones
 * they extend.
 *
 * @example
 * ```typescript
 * @Implements(GreeterC, ClosableC)
 * class Greeter implements GreeterApi, Closable { ... }
 * ```
 */
export function Implements(...capabilities: Capability[]): ClassDecorator {
  for (const cap of capabilities) {
    if (!isCapability(cap)) {
      throw new Error(
        "@Implements() expects capabilities. Create one with `const FooC = capability<Foo>('Foo', { ... })`"
      );
    }
  }

  return (target) => {
    const constructor = target as unknown as Constructor;
    StaticTypeRegistry.registerCapabilities(constructor, capabilities);
  };
}
