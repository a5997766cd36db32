import { describe, expect, it, vi } from 'vitest';

import { capability } from '../src/core/capability.js';
import { Component } from '../src/core/component.js';
import { callMethod } from '../src/core/invocation.js';
import { Types } from '../src/core/type-ref.js';
import { Implements } from '../src/decorators/index.js';
import {
  InvalidCapabilityError,
  InvocationTargetError,
  NoSuchMethodError,
} from '../src/errors/errors.js';
import type { InvocationInterceptor, MethodDescriptor } from '../src/types/types.js';

interface Named {
  name(): string;
}

interface Greeter extends Named {
  greet(who: string): string;
}

interface Closable {
  close(): void;
}

const NamedC = capability<Named>('Named', { name: [] });
const GreeterC = capability<Greeter>('Greeter', { greet: [Types.String] }, { extends: [NamedC] });
const ClosableC = capability<Closable>('Closable', { close: [] });

const failure = new Error('greeting failed');

@Implements(GreeterC)
class Greeting implements Greeter {
  name(): string {
    return 'greeting';
  }

  greet(who: string): string {
    if (who === 'nobody') throw failure;
    return `Hello, ${who}`;
  }
}

const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected a throw');
};

describe('Component dispatch', () => {
  it('hands intercepted calls to the interceptor with implementation, method and arguments', () => {
    const implementation = new Greeting();
    const component = new Component(implementation);
    const interceptor = vi.fn(
      (_target: object, _method: MethodDescriptor, _args: readonly unknown[]) => 'intercepted'
    );
    component.setInvocationInterceptor(GreeterC, interceptor);

    expect(component.getProxy(GreeterC).greet('Ada')).toBe('intercepted');
    expect(interceptor).toHaveBeenCalledWith(
      implementation,
      expect.objectContaining({ name: 'greet', declaringType: GreeterC }),
      ['Ada']
    );
  });

  it('accepts interceptor objects that forward to the implementation', () => {
    const component = new Component(new Greeting());
    const interceptor: InvocationInterceptor = {
      invoke: (target, method, args) => `${String(callMethod(target, method, args))}!`,
    };
    component.setInvocationInterceptor(GreeterC, interceptor);

    expect(component.getProxy(GreeterC).greet('Ada')).toBe('Hello, Ada!');
  });

  it('rethrows the implementation failure itself, never a wrapper', () => {
    const component = new Component(new Greeting());

    expect(catchError(() => component.getProxy(GreeterC).greet('nobody'))).toBe(failure);
  });

  it('strips wrappers raised while an interceptor forwards the call', () => {
    const component = new Component(new Greeting());
    component.setInvocationInterceptor(GreeterC, (target, method, args) =>
      callMethod(target, method, args)
    );

    expect(catchError(() => component.getProxy(GreeterC).greet('nobody'))).toBe(failure);
  });

  it('strips nested wrappers thrown by an interceptor', () => {
    const original = new TypeError('deep');
    const component = new Component(new Greeting());
    component.setInvocationInterceptor(GreeterC, () => {
      throw new InvocationTargetError('outer', new InvocationTargetError('inner', original));
    });

    expect(catchError(() => component.getProxy(GreeterC).name())).toBe(original);
  });

  it('passes interceptor failures through unchanged', () => {
    const refusal = new Error('not today');
    const component = new Component(new Greeting());
    component.setInvocationInterceptor(GreeterC, () => {
      throw refusal;
    });

    expect(catchError(() => component.getProxy(GreeterC).greet('Ada'))).toBe(refusal);
  });

  it('falls back to the interceptor of the declaring capability', () => {
    const component = new Component(new Greeting());
    component.setInvocationInterceptor(NamedC, () => 'renamed');
    const proxy = component.getProxy(GreeterC);

    expect(proxy.name()).toBe('renamed');
    expect(proxy.greet('Ada')).toBe('Hello, Ada');
  });

  it('prefers the interceptor of the proxy capability', () => {
    const component = new Component(new Greeting());
    component.setInvocationInterceptor(NamedC, () => 'from Named');
    component.setInvocationInterceptor(GreeterC, () => 'from Greeter');

    expect(component.getProxy(GreeterC).name()).toBe('from Greeter');
    expect(component.getProxy(NamedC).name()).toBe('from Named');
  });

  it('validates interceptor capabilities like proxies', () => {
    const component = new Component(new Greeting());

    expect(() => component.setInvocationInterceptor(ClosableC, () => undefined)).toThrow(
      InvalidCapabilityError
    );
  });

  it('reports capability methods the implementation lacks', () => {
    const component = new Component({}, { capabilities: [ClosableC] });

    const error = catchError(() => component.getProxy(ClosableC).close());

    expect(error).toBeInstanceOf(NoSuchMethodError);
    if (!(error instanceof NoSuchMethodError)) return;
    expect(error.methodName).toBe('close');
    expect(error.typeName).toBe('Closable');
  });
});

describe('Component.invoke', () => {
  it('calls capability methods by name', () => {
    const component = new Component(new Greeting());

    expect(component.invoke('greet', 'Ada')).toBe('Hello, Ada');
    expect(component.invoke('name')).toBe('greeting');
  });

  it('coerces arguments to the declared parameter types', () => {
    const component = new Component(new Greeting());

    expect(component.invoke('greet', 5)).toBe('Hello, 5');
  });

  it('rejects names and arities no capability declares', () => {
    const component = new Component(new Greeting());

    const error = catchError(() => component.invoke('greet'));

    expect(error).toBeInstanceOf(NoSuchMethodError);
    if (!(error instanceof NoSuchMethodError)) return;
    expect(error.methodName).toBe('greet');
    expect(error.arity).toBe(0);
    expect(error.typeName).toBe('Greeting');
    expect(() => component.invoke('close')).toThrow(NoSuchMethodError);
  });

  it('rethrows the implementation failure itself', () => {
    const component = new Component(new Greeting());

    expect(catchError(() => component.invoke('greet', 'nobody'))).toBe(failure);
  });
});
