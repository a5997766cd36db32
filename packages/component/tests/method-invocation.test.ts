import { describe, expect, it, vi } from 'vitest';

import { capability } from '../src/core/capability.js';
import { attempt, callMethod, injectInto, invokeMethod } from '../src/core/invocation.js';
import { MethodInvocation } from '../src/core/method-invocation.js';
import { Types } from '../src/core/type-ref.js';
import {
  InjectionError,
  InvocationTargetError,
  NoSuchMethodError,
  rootCause,
} from '../src/errors/errors.js';
import type { MethodDescriptor, TypeRef } from '../src/types/types.js';

const CalculatorC = capability('Calculator');

const method = (name: string, ...parameterTypes: TypeRef[]): MethodDescriptor => ({
  name,
  declaringType: CalculatorC,
  parameterTypes,
});

const calculator = {
  add(a: number, b: number) {
    return a + b;
  },
  format(value: unknown) {
    return `<${typeof value}:${String(value)}>`;
  },
  fail() {
    throw new Error('calculator broke');
  },
};

const add = method('add', Types.Number, Types.Number);

describe('MethodInvocation', () => {
  const formatString = method('format', Types.String);
  const formatNumber = method('format', Types.Number);

  it('prefers a candidate the arguments fit as they are', () => {
    const invocation = new MethodInvocation(calculator, 'format', [formatString, formatNumber], [5]);

    const resolved = invocation.resolve();

    expect(resolved.ok && resolved.value.method).toBe(formatNumber);
    expect(invocation.invoke()).toEqual({ ok: true, value: '<number:5>' });
  });

  it('falls back to the first candidate the converter can coerce to', () => {
    const invocation = new MethodInvocation(calculator, 'format', [formatString, formatNumber], [true]);

    expect(invocation.invoke()).toEqual({ ok: true, value: '<string:true>' });
    expect(new MethodInvocation(calculator, 'add', [add], ['1', '2']).invoke()).toEqual({
      ok: true,
      value: 3,
    });
  });

  it('reports a missing method when nothing fits', () => {
    const noMatch = new MethodInvocation(calculator, 'add', [add], ['x', 'y']).invoke();
    const wrongArity = new MethodInvocation(calculator, 'add', [add], [1]).invoke();
    const wrongName = new MethodInvocation(calculator, 'subtract', [add], [1, 2]).invoke();

    for (const result of [noMatch, wrongArity, wrongName]) {
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBeInstanceOf(NoSuchMethodError);
    }
    if (!noMatch.ok && noMatch.error instanceof NoSuchMethodError) {
      expect(noMatch.error.methodName).toBe('add');
      expect(noMatch.error.arity).toBe(2);
      expect(noMatch.error.typeName).toBe('Object');
    }
  });

  it('wraps failures thrown by the resolved method', () => {
    const result = new MethodInvocation(calculator, 'fail', [method('fail')], []).invoke();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(InvocationTargetError);
    expect(rootCause(result.error)).toEqual(new Error('calculator broke'));
  });

  it('uses the converter it was given', () => {
    const converter = {
      convert: vi.fn(),
      convertAll: vi.fn(() => ({ ok: true as const, value: [40, 2] })),
    };

    const result = new MethodInvocation(calculator, 'add', [add], ['a', 'b'], converter).invoke();

    expect(result).toEqual({ ok: true, value: 42 });
  });
});

describe('invocation helpers', () => {
  it('attempt captures throws as failures', () => {
    const failure = new Error('nope');

    expect(attempt(() => 1)).toEqual({ ok: true, value: 1 });
    expect(
      attempt(() => {
        throw failure;
      })
    ).toEqual({ ok: false, error: failure });
  });

  it('invokeMethod looks the method up on the target at call time', () => {
    const target = { ping: () => 'pong' };

    expect(invokeMethod(target, method('ping'), [])).toEqual({ ok: true, value: 'pong' });

    const missing = invokeMethod(target, method('pong'), []);
    expect(missing.ok).toBe(false);
    if (!missing.ok) expect(missing.error).toBeInstanceOf(NoSuchMethodError);
  });

  it('callMethod throws the invocation wrapper for the dispatch boundary to strip', () => {
    const error = attempt(() => callMethod(calculator, method('fail'), []));

    expect(error.ok).toBe(false);
    if (error.ok) return;
    expect(error.error).toBeInstanceOf(InvocationTargetError);
    expect(callMethod(calculator, add, [1, 1])).toBe(2);
  });

  it('injectInto rethrows Errors and wraps anything else', () => {
    const typeError = new TypeError('bad value');
    const target = {
      setStrict(_value: unknown) {
        throw typeError;
      },
      setLoose(_value: unknown) {
        throw 42;
      },
      setOk(_value: unknown) {},
    };

    expect(() => injectInto(target, method('setOk', Types.Unknown), 1)).not.toThrow();
    expect(attempt(() => injectInto(target, method('setStrict', Types.Unknown), 1))).toEqual({
      ok: false,
      error: typeError,
    });

    const wrapped = attempt(() => injectInto(target, method('setLoose', Types.Unknown), 1));
    expect(wrapped.ok).toBe(false);
    if (wrapped.ok) return;
    expect(wrapped.error).toBeInstanceOf(InjectionError);
    if (!(wrapped.error instanceof InjectionError)) return;
    expect(wrapped.error.message).toBe("can't invoke method 'setLoose' with argument 1");
    expect(wrapped.error.cause).toBe(42);
  });

  it('injectInto surfaces a missing method as is', () => {
    expect(() => injectInto({}, method('setGone', Types.Unknown), 1)).toThrow(NoSuchMethodError);
  });
});
