/* Component
 *
 * Wraps exactly one implementation object and mediates all typed access to
 * it:
 *  - exposes the capabilities the implementation's class declares
 *  - hands out proxies per capability, memoized
 *  - injects configuration and peer proxies through setters
 *  - wires listeners between peers through register/unregister hooks
 *  - routes every proxied call through an optional capability interceptor
 *
 * Bookkeeping is plain maps without locking; wiring is expected to happen in
 * a single assembly phase, after which proxies are mostly read.
 *
 * Removing a dependency only clears bookkeeping. Setters that received a peer
 * proxy keep it; nothing is un-injected.
 */
import type { Logger } from 'pino';

import {
  AmbiguousSetterError,
  ConfigurationError,
  InvalidCapabilityError,
  InvalidImplementationError,
  rootCause,
} from '../errors/errors.js';
import {
  capabilitiesOf,
  classOf,
  instanceMethodsByNameAndArity,
  methodsByNameAndArity,
} from '../introspection/introspection.js';
import { childLogger } from '../logging/logger.js';
import type {
  ComponentOptions,
  Facade,
  InterceptorFn,
  InvocationInterceptor,
  MethodDescriptor,
  Properties,
  Result,
} from '../types/types.js';
import { isCapability, type Capability } from './capability.js';
import { defaultConverter, type Converter } from './converter.js';
import { attempt, injectInto, invokeMethod } from './invocation.js';
import { MethodInvocation } from './method-invocation.js';
import { capabilityOfProxy, createCapabilityProxy } from './proxy.js';
import { isAssignable } from './type-ref.js';

/** Setter receiving the whole raw property map */
export const PROPERTIES_PROPERTY_KEY = 'properties';
export const REGISTER_LISTENER_METHOD_NAME = 'register';
export const UNREGISTER_LISTENER_METHOD_NAME = 'unregister';

/**
 * `name` -> `Name`. Only the first character changes.
 */
export function makeFirstCharUpperCase(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

const identities = new WeakMap<object, number>();
let _identityCounter = 0;

function identityOf(value: object): number {
  let id = identities.get(value);
  if (id === undefined) {
    id = ++_identityCounter;
    identities.set(value, id);
  }
  return id;
}

function implementationName(implementation: object): string {
  return classOf(implementation)?.name ?? 'Object';
}

export class Component<T extends object = object> {
  readonly implementation: T;

  private readonly capabilities: readonly Capability[];
  private readonly converter: Converter;
  private readonly log: Logger;

  private properties?: Properties;
  private readonly setterInjectedProperties = new Map<string, unknown>();
  private readonly interceptors = new Map<Capability, InvocationInterceptor>();
  private readonly proxiesByCapability = new Map<Capability, unknown>();
  /** peer id -> capabilities injected from that peer */
  private readonly injectedCapabilitiesByPeer = new Map<string, Set<Capability>>();
  /** capability -> proxy obtained from the facade for it */
  private readonly referencesByCapability = new Map<Capability, unknown>();
  /** peer implementation -> capability -> listener proxy handed to `register` */
  private readonly listenersByPeer = new Map<object, Map<Capability, unknown>>();

  constructor(implementation: T, options: ComponentOptions = {}) {
    if (typeof implementation !== 'object' || implementation === null) {
      throw new InvalidImplementationError(implementation);
    }
    this.implementation = implementation;

    const declared = capabilitiesOf(classOf(implementation) ?? Object);
    for (const cap of options.capabilities ?? []) {
      if (!isCapability(cap)) {
        throw new InvalidCapabilityError(String(cap), implementationName(implementation), 'not-a-capability');
      }
      if (!declared.includes(cap)) declared.push(cap);
    }
    this.capabilities = Object.freeze(declared);

    this.converter = options.converter ?? defaultConverter;
    this.log = options.logger ?? childLogger({ component: implementationName(implementation) });
  }

  getCapabilities(): readonly Capability[] {
    return this.capabilities;
  }

  /**
   * True when the implementation exposes `cap`, directly or through a
   * capability that extends it.
   */
  implementsCapability(cap: Capability): boolean {
    return this.capabilities.some((own) => isAssignable(cap, own));
  }

  /**
   * Generate a new proxy for `cap`. Every call on it comes back through
   * {@link dispatch}.
   *
   * @throws InvalidCapabilityError when `cap` is not a capability or is not
   *   implemented
   */
  createProxy<C>(cap: Capability<C>): C {
    this.checkCapability(cap);
    return createCapabilityProxy(cap, (proxy, method, args) => this.dispatch(proxy, method, args));
  }

  /**
   * Memoized {@link createProxy}: one proxy per capability for the lifetime
   * of the component.
   */
  getProxy<C>(cap: Capability<C>): C {
    if (this.proxiesByCapability.has(cap)) return this.proxiesByCapability.get(cap) as C;
    const proxy = this.createProxy(cap);
    this.proxiesByCapability.set(cap, proxy);
    return proxy;
  }

  /**
   * Inject configuration through setters named after the keys.
   *
   * `timeout` goes to a single-parameter `setTimeout`, its value coerced to
   * the setter's parameter type. Keys without a setter are ignored. A
   * `setProperties` setter finally receives the whole map.
   *
   * @throws AmbiguousSetterError when more than one setter matches a key
   * @throws ConfigurationError when a value can not be coerced
   */
  setProperties(properties: Properties): void {
    for (const [key, value] of Object.entries(properties)) {
      this.injectPropertyIfMatchingSetterFound(key, value);
    }
    this.injectPropertyIfMatchingSetterFound(PROPERTIES_PROPERTY_KEY, properties);
    this.properties = properties;
  }

  /** Last map passed to {@link setProperties}. */
  getProperties(): Properties | undefined {
    return this.properties;
  }

  /** Keys that actually reached a setter, with the value it received. */
  getSetterInjectedProperties(): ReadonlyMap<string, unknown> {
    return new Map(this.setterInjectedProperties);
  }

  /**
   * Wire peer `peerId` into this component.
   *
   * Every single-parameter `set<PeerId>` setter accepting one of the
   * requested capabilities receives the facade's proxy for it. Calling again
   * for the same peer reconciles: capabilities no longer requested are
   * forgotten, newly requested ones are injected, and the peer is dropped
   * once nothing remains.
   */
  setReference(facade: Facade, peerId: string, ...capabilities: Capability[]): void {
    const current = this.injectedCapabilitiesByPeer.get(peerId);
    if (!current) {
      this.recordReferences(peerId, new Set(), this.injectProxies(facade, peerId, capabilities));
      return;
    }

    const requested = new Set(capabilities);
    const dropped = [...current].filter((cap) => !requested.has(cap));
    for (const cap of dropped) {
      current.delete(cap);
      this.referencesByCapability.delete(cap);
    }

    const added = [...requested].filter((cap) => !current.has(cap));
    this.recordReferences(peerId, current, this.injectProxies(facade, peerId, added));

    if (current.size === 0) {
      this.injectedCapabilitiesByPeer.delete(peerId);
      for (const cap of capabilities) this.referencesByCapability.delete(cap);
    }
  }

  /** Capabilities currently injected from `peerId`. */
  getInjectedCapabilities(peerId: string): Set<Capability> {
    return new Set(this.injectedCapabilitiesByPeer.get(peerId));
  }

  /**
   * Proxy injected for `cap` by {@link setReference}, if any.
   */
  getReference<C>(cap: Capability<C>): C | undefined {
    return this.referencesByCapability.get(cap) as C | undefined;
  }

  /**
   * Forget everything wired from `peerId`. The implementation keeps whatever
   * its setters received.
   */
  removeDependency(peerId: string): void {
    const removed = this.injectedCapabilitiesByPeer.get(peerId);
    this.injectedCapabilitiesByPeer.delete(peerId);
    for (const cap of removed ?? []) this.referencesByCapability.delete(cap);
  }

  /**
   * Hand this implementation a listener proxy for every capability of `peer`
   * it has a `register(capability)` hook for. Capabilities without a hook
   * are skipped; a hook that throws aborts the call.
   */
  register(peer: Component): void {
    for (const cap of peer.getCapabilities()) {
      const hook = this.listenerHook(REGISTER_LISTENER_METHOD_NAME, cap);
      if (!hook) continue;
      const listener = peer.createProxy(cap);
      this.log.debug({ capability: cap.label }, 'registering proxy');
      injectInto(this.implementation, hook, listener);

      let registered = this.listenersByPeer.get(peer.implementation);
      if (!registered) {
        registered = new Map();
        this.listenersByPeer.set(peer.implementation, registered);
      }
      registered.set(cap, listener);
    }
  }

  /**
   * Inverse of {@link register}: hand each remembered listener proxy to the
   * matching `unregister(capability)` hook.
   */
  unregister(peer: Component): void {
    const registered = this.listenersByPeer.get(peer.implementation);
    if (!registered) return;
    for (const cap of peer.getCapabilities()) {
      const hook = this.listenerHook(UNREGISTER_LISTENER_METHOD_NAME, cap);
      if (!hook || !registered.has(cap)) continue;
      this.log.debug({ capability: cap.label }, 'unregistering proxy');
      injectInto(this.implementation, hook, registered.get(cap));
      registered.delete(cap);
    }
    if (registered.size === 0) this.listenersByPeer.delete(peer.implementation);
  }

  /**
   * Give `handler` first refusal on calls arriving through proxies for
   * `cap`, or for methods `cap` declares.
   *
   * @throws InvalidCapabilityError like {@link createProxy}
   */
  setInvocationInterceptor(cap: Capability, handler: InvocationInterceptor | InterceptorFn): void {
    this.checkCapability(cap);
    this.interceptors.set(cap, typeof handler === 'function' ? { invoke: handler } : handler);
  }

  /**
   * Entry point for every call made on a proxy of this component.
   *
   * Whatever the implementation or interceptor throws is rethrown as is;
   * invocation wrappers never reach the caller.
   */
  dispatch(proxy: object, method: MethodDescriptor, args: readonly unknown[]): unknown {
    const result = this.mediate(proxy, method, args);
    if (!result.ok) throw rootCause(result.error);
    return result.value;
  }

  /**
   * Call a capability method by name, resolving overloads across all
   * capabilities of the component and coercing arguments when needed.
   *
   * @throws NoSuchMethodError when no candidate accepts the arguments
   */
  invoke(methodName: string, ...args: unknown[]): unknown {
    const candidates = this.capabilities.flatMap((cap) =>
      methodsByNameAndArity(cap, methodName, args.length)
    );
    const result = new MethodInvocation(
      this.implementation,
      methodName,
      candidates,
      args,
      this.converter
    ).invoke();
    if (!result.ok) throw rootCause(result.error);
    return result.value;
  }

  /**
   * Same implementation, whether `other` is a component or the
   * implementation itself.
   */
  equals(other: unknown): boolean {
    return (
      (other instanceof Component && other.implementation === this.implementation) ||
      other === this.implementation
    );
  }

  hashCode(): number {
    return identityOf(this.implementation);
  }

  toString(): string {
    const impl = this.implementation;
    const described = typeof Reflect.get(impl, 'toString') === 'function' ? String(impl) : implementationName(impl);
    return `component with impl: ${described}`;
  }

  private mediate(proxy: object, method: MethodDescriptor, args: readonly unknown[]): Result<unknown> {
    const arrivedAs = capabilityOfProxy(proxy);
    let interceptor = arrivedAs ? this.interceptors.get(arrivedAs) : undefined;
    if (!interceptor && isCapability(method.declaringType)) {
      interceptor = this.interceptors.get(method.declaringType);
    }
    if (interceptor) {
      const handler = interceptor;
      return attempt(() => handler.invoke(this.implementation, method, args));
    }
    return invokeMethod(this.implementation, method, args);
  }

  private checkCapability(cap: unknown): asserts cap is Capability {
    const impl = implementationName(this.implementation);
    if (!isCapability(cap)) {
      throw new InvalidCapabilityError(describeNonCapability(cap), impl, 'not-a-capability');
    }
    if (!this.implementsCapability(cap)) {
      throw new InvalidCapabilityError(cap.label, impl, 'not-implemented');
    }
  }

  private settersFor(key: string): MethodDescriptor[] {
    return instanceMethodsByNameAndArity(this.implementation, `set${makeFirstCharUpperCase(key)}`, 1);
  }

  private injectPropertyIfMatchingSetterFound(key: string, value: unknown): void {
    const setters = this.settersFor(key);
    if (setters.length > 1) throw new AmbiguousSetterError(key, setters.length);
    const [setter] = setters;
    if (!setter) return;

    const converted = this.converter.convert(value, setter.parameterTypes[0]);
    if (!converted.ok) {
      throw new ConfigurationError(
        `can not inject property '${key}' into ${setter.name}: ${converted.error.message}`,
        { cause: converted.error }
      );
    }
    injectInto(this.implementation, setter, converted.value);
    this.setterInjectedProperties.set(key, converted.value);
  }

  /**
   * Hand the facade's proxies to every matching setter and return them per
   * capability. Bookkeeping is left to the caller, once every setter ran.
   */
  private injectProxies(
    facade: Facade,
    peerId: string,
    capabilities: readonly Capability[]
  ): Map<Capability, unknown> {
    const injected = new Map<Capability, unknown>();
    for (const setter of this.settersFor(peerId)) {
      for (const cap of capabilities) {
        if (!isAssignable(setter.parameterTypes[0], cap)) continue;
        const proxy = facade.getProxy(peerId, cap);
        this.log.debug({ capability: cap.label, peer: peerId, setter: setter.name }, 'injecting proxy');
        injectInto(this.implementation, setter, proxy);
        injected.set(cap, proxy);
      }
    }
    return injected;
  }

  private recordReferences(peerId: string, recorded: Set<Capability>, injected: Map<Capability, unknown>): void {
    for (const [cap, proxy] of injected) {
      recorded.add(cap);
      this.referencesByCapability.set(cap, proxy);
    }
    if (recorded.size > 0) this.injectedCapabilitiesByPeer.set(peerId, recorded);
  }

  /** `register`/`unregister` method taking exactly `cap`, if declared. */
  private listenerHook(name: string, cap: Capability): MethodDescriptor | undefined {
    return instanceMethodsByNameAndArity(this.implementation, name, 1).find(
      (m) => m.parameterTypes[0] === cap
    );
  }
}

function describeNonCapability(value: unknown): string {
  if (typeof value === 'function') return value.name || 'anonymous function';
  return String(value);
}
