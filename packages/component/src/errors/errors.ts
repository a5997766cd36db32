const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Thrown when a Component is constructed around a missing implementation.
 */
export class InvalidImplementationError extends Error {
  constructor(public received: unknown) {
    const dev = [
      'Invalid component implementation',
      '',
      `A component must wrap an object, received: ${String(received)}.`,
    ];
    super(format('Implementation can not be null.', dev));
    this.name = 'InvalidImplementationError';
  }
}

export type InvalidCapabilityReason = 'not-a-capability' | 'not-implemented';

/**
 * Requested capability is not a capability, or the wrapped implementation
 * does not implement it.
 */
export class InvalidCapabilityError extends Error {
  constructor(
    public capability: string,
    public implementation: string,
    public reason: InvalidCapabilityReason
  ) {
    const short =
      reason === 'not-a-capability'
        ? `${capability} is not a capability.`
        : `${implementation} does not implement ${capability}.`;
    const dev =
      reason === 'not-a-capability'
        ? [
            'Invalid capability',
            '',
            `${capability} is not a capability.`,
            '',
            "Create one with `const FooC = capability<Foo>('Foo', { ... })`.",
          ]
        : [
            'Invalid capability',
            '',
            `${implementation} does not implement ${capability}.`,
            '',
            'To fix this:',
            `  1. Add ${capability} to the @Implements() decorator of ${implementation}`,
            `  2. Or pass it in the 'capabilities' option when wrapping an object literal`,
          ];
    super(format(short, dev));
    this.name = 'InvalidCapabilityError';
  }
}

/**
 * Wiring or property configuration that can not be applied.
 */
export class ConfigurationError extends Error {
  constructor(
    public reason: string,
    options?: { cause?: unknown }
  ) {
    super(format(reason, ['Configuration error', '', reason]), options);
    this.name = 'ConfigurationError';
  }
}

/**
 * More than one setter matches a property key.
 */
export class AmbiguousSetterError extends ConfigurationError {
  constructor(
    public key: string,
    public count: number
  ) {
    super(`more than 1 (${count}) setter found for property '${key}'`);
    this.name = 'AmbiguousSetterError';
  }
}

/**
 * No constructor matches the supplied arguments, or a constructor threw a
 * value that is not an Error.
 */
export class InstantiationError extends Error {
  constructor(
    public className: string,
    public argumentTypes: string[],
    public detail: string,
    options?: { cause?: unknown }
  ) {
    const args = argumentTypes.join(',');
    const dev = [
      `Can not instantiate class ${className}`,
      '',
      detail,
      '',
      `Arguments: (${args})`,
      '',
      'To fix this:',
      `  1. Declare a matching signature with @Constructs() on ${className}`,
      `  2. Or pass arguments the converter can coerce to a declared signature`,
    ];
    super(format(`Can not instantiate class ${className} with (${args}): ${detail}`, dev), options);
    this.name = 'InstantiationError';
  }
}

/**
 * No method candidate matches a name, arity and argument list.
 */
export class NoSuchMethodError extends Error {
  constructor(
    public methodName: string,
    public arity: number,
    public typeName: string
  ) {
    const dev = [
      'No such method',
      '',
      `${typeName} exposes no method '${methodName}' taking ${arity} argument(s)`,
      'that accepts the supplied arguments.',
    ];
    super(format(`No method '${methodName}/${arity}' found on ${typeName}.`, dev));
    this.name = 'NoSuchMethodError';
  }
}

/**
 * Wrapper around a failure raised inside an invoked method.
 *
 * Produced by the invocation plumbing and stripped again before callers of a
 * proxy see anything; see {@link rootCause}.
 */
export class InvocationTargetError extends Error {
  constructor(
    public methodName: string,
    cause: unknown
  ) {
    super(`Method '${methodName}' threw during invocation.`, { cause });
    this.name = 'InvocationTargetError';
  }
}

/**
 * A value can not be coerced to the requested type.
 */
export class CoercionError extends Error {
  constructor(
    public value: unknown,
    public targetType: string,
    public issue?: string
  ) {
    let valueString: string;
    try {
      valueString = JSON.stringify(value) ?? String(value);
    } catch {
      valueString = String(value);
    }
    const suffix = issue ? `: ${issue}` : '';
    super(`Can not convert ${valueString} to ${targetType}${suffix}`);
    this.name = 'CoercionError';
  }
}

/**
 * A setter or listener hook threw a value that is not an Error.
 */
export class InjectionError extends Error {
  constructor(
    public methodName: string,
    public argument: unknown,
    cause: unknown
  ) {
    super(`can't invoke method '${methodName}' with argument ${String(argument)}`, { cause });
    this.name = 'InjectionError';
  }
}

/**
 * Facade has no component registered under the requested id.
 */
export class ComponentNotFoundError extends Error {
  constructor(
    public componentId: string,
    public availableComponents: string[]
  ) {
    const parts = [`Component '${componentId}' is not registered.`, ''];
    if (availableComponents.length > 0 && availableComponents.length <= 10) {
      parts.push('Available components:');
      availableComponents.forEach((id) => parts.push(`  - ${id}`));
    } else if (availableComponents.length > 10) {
      parts.push(`${availableComponents.length} components are registered.`);
    }
    super(format(`Component '${componentId}' is not registered.`, parts));
    this.name = 'ComponentNotFoundError';
  }
}

/**
 * Strip invocation wrappers until the original failure is reached.
 */
export function rootCause(error: unknown): unknown {
  let current = error;
  while (current instanceof InvocationTargetError) {
    current = current.cause;
  }
  return current;
}
