import { isConstructor } from '../core/type-ref.js';
import { StaticTypeRegistry } from '../registry/static-registry.js';
import type { TypeRef } from '../types/types.js';

/**
 * Declares the parameter types of an instance method.
 *
 * Setter injection, listener registration and by-name invocation match on
 * these types. Repeat the decorator to declare overloads of the same method.
 *
 * @example
 * ```typescript
 * class Mailer {
 *   @Accepts(Types.Number)
 *   setPort(port: number) { ... }
 *
 *   @Accepts(AuditLogC)
 *   setAudit(log: AuditLog) { ... }
 * }
 * ```
 */
export function Accepts(...parameterTypes: TypeRef[]): MethodDecorator {
  return function (target: object, propertyKey: string | symbol) {
    if (typeof target === 'function') {
      throw new Error(`@Accepts() applies to instance methods, not static '${String(propertyKey)}'`);
    }
    if (typeof propertyKey !== 'string') {
      throw new Error('@Accepts() expects a string-named method');
    }
    const constructor: unknown = Reflect.get(target, 'constructor');
    if (!isConstructor(constructor)) {
      throw new Error(`@Accepts() could not find the class declaring '${propertyKey}'`);
    }
    StaticTypeRegistry.registerMethod(constructor, propertyKey, parameterTypes);
  };
}
