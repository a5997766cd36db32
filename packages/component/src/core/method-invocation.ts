import { NoSuchMethodError } from '../errors/errors.js';
import type { MethodDescriptor, Result } from '../types/types.js';
import { defaultConverter, type Converter } from './converter.js';
import { invokeMethod } from './invocation.js';
import { isAssignable, runtimeTypeOf } from './type-ref.js';

export interface ResolvedCall {
  method: MethodDescriptor;
  args: unknown[];
}

/**
 * Overload resolution plus invocation for by-name calls.
 *
 * Resolution order:
 *   1. first candidate whose parameter types accept the arguments as they are
 *   2. first candidate for which the converter coerces every argument
 *
 * A candidate of the wrong arity is never considered.
 */
export class MethodInvocation {
  constructor(
    private readonly target: object,
    private readonly methodName: string,
    private readonly candidates: readonly MethodDescriptor[],
    private readonly args: readonly unknown[],
    private readonly converter: Converter = defaultConverter
  ) {}

  resolve(): Result<ResolvedCall, NoSuchMethodError> {
    const arity = this.args.length;
    const sized = this.candidates.filter(
      (m) => m.name === this.methodName && m.parameterTypes.length === arity
    );

    const argTypes = this.args.map(runtimeTypeOf);
    for (const method of sized) {
      if (method.parameterTypes.every((t, i) => isAssignable(t, argTypes[i]))) {
        return { ok: true, value: { method, args: [...this.args] } };
      }
    }

    for (const method of sized) {
      const converted = this.converter.convertAll(this.args, method.parameterTypes);
      if (converted.ok) return { ok: true, value: { method, args: converted.value } };
    }

    const owner = this.target.constructor?.name || 'object';
    return { ok: false, error: new NoSuchMethodError(this.methodName, arity, owner) };
  }

  /**
   * Resolve and call. A throw from the method comes back wrapped in an
   * InvocationTargetError.
   */
  invoke(): Result<unknown> {
    const resolved = this.resolve();
    if (!resolved.ok) return resolved;
    return invokeMethod(this.target, resolved.value.method, resolved.value.args);
  }
}
