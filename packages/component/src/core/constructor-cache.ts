import type { Constructor, ConstructorDescriptor } from '../types/types.js';

/**
 * Last successfully used constructor signature per class.
 *
 * Instantiation tries the cached entry first and falls back to full
 * resolution when it fails.
 *
 * Memory characteristics:
 * - Weakly keyed by class, entries go away with the class
 * - One descriptor reference per class
 */
export class ConstructorCache {
  private readonly index = new WeakMap<Constructor, ConstructorDescriptor>();

  get(type: Constructor): ConstructorDescriptor | undefined {
    return this.index.get(type);
  }

  /**
   * Remember `descriptor` as the last one that worked for its class.
   * Overwrites unconditionally.
   */
  prime(descriptor: ConstructorDescriptor): void {
    this.index.set(descriptor.declaringType, descriptor);
  }
}
