export { Component, makeFirstCharUpperCase } from './core/component.js';
export { ComponentFacade } from './core/facade.js';
export { InstantiationContext } from './introspection/instantiation.js';

export { Accepts, Constructs, Implements } from './decorators/index.js';
export { StaticTypeRegistry } from './registry/static-registry.js';

export * from './core/capability.js';
export { Types, isAssignable, runtimeTypeOf, typeName } from './core/type-ref.js';
export type { PrimitiveName, PrimitiveType } from './core/type-ref.js';
export { capabilityOfProxy, isCapabilityProxy } from './core/proxy.js';

export { StandardConverter, defaultConverter } from './core/converter.js';
export type { Converter } from './core/converter.js';
export { MethodInvocation } from './core/method-invocation.js';
export type { ResolvedCall } from './core/method-invocation.js';
export { callMethod } from './core/invocation.js';

export {
  ancestryOf,
  boundedAncestryOf,
  capabilitiesAndAncestryOf,
  capabilitiesOf,
  classOf,
  constructorsOf,
  implementsCapability,
  methodsByNameAndArity,
} from './introspection/introspection.js';

export type {
  ComponentOptions,
  Constructor,
  ConstructorDescriptor,
  Facade,
  InstantiationOptions,
  InterceptorFn,
  InvocationInterceptor,
  MethodDescriptor,
  Properties,
  Result,
  TypeRef,
} from './types/types.js';

export { logger, resolveLogLevel } from './logging/logger.js';

// Errors
export {
  AmbiguousSetterError,
  CoercionError,
  ComponentNotFoundError,
  ConfigurationError,
  InjectionError,
  InstantiationError,
  InvalidCapabilityError,
  InvalidImplementationError,
  InvocationTargetError,
  NoSuchMethodError,
  rootCause,
} from './errors/errors.js';
