import { InjectionError, InvocationTargetError, NoSuchMethodError } from '../errors/errors.js';
import type { MethodDescriptor, Result } from '../types/types.js';
import { typeName } from './type-ref.js';

/**
 * Run `fn`, capturing a throw as a failure.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Invoke `method` on `target`.
 *
 * The method is looked up on the target at call time. A throw from inside
 * the method comes back wrapped in an InvocationTargetError; a missing method
 * comes back as a NoSuchMethodError.
 */
export function invokeMethod(
  target: object,
  method: MethodDescriptor,
  args: readonly unknown[]
): Result<unknown> {
  const fn: unknown = Reflect.get(target, method.name);
  if (typeof fn !== 'function') {
    return {
      ok: false,
      error: new NoSuchMethodError(method.name, args.length, typeName(method.declaringType)),
    };
  }
  try {
    const value: unknown = Reflect.apply(fn, target, args);
    return { ok: true, value };
  } catch (cause) {
    return { ok: false, error: new InvocationTargetError(method.name, cause) };
  }
}

/**
 * Throwing form of {@link invokeMethod}, for interceptors that forward to the
 * implementation. The wrapper it throws is removed again at the dispatch
 * boundary.
 */
export function callMethod(target: object, method: MethodDescriptor, args: readonly unknown[]): unknown {
  const result = invokeMethod(target, method, args);
  if (!result.ok) throw result.error;
  return result.value;
}

/**
 * Invoke a single-argument setter or listener hook.
 *
 * Errors thrown by the method propagate unchanged; any other thrown value is
 * wrapped in an InjectionError naming the method and argument.
 */
export function injectInto(target: object, method: MethodDescriptor, argument: unknown): void {
  const result = invokeMethod(target, method, [argument]);
  if (result.ok) return;
  const failure = result.error;
  if (failure instanceof InvocationTargetError) {
    if (failure.cause instanceof Error) throw failure.cause;
    throw new InjectionError(method.name, argument, failure.cause);
  }
  throw failure;
}
