import { ComponentNotFoundError } from '../errors/errors.js';
import type { Facade } from '../types/types.js';
import type { Capability } from './capability.js';
import type { Component } from './component.js';

/**
 * In-memory {@link Facade}: component id -> component.
 *
 * Enough to assemble a handful of components by hand and wire them with
 * {@link connect}; anything with lifecycle ordering belongs to a container
 * built on top.
 */
export class ComponentFacade implements Facade {
  private readonly components = new Map<string, Component>();

  /**
   * Register `component` under `id`, replacing any previous one.
   */
  add(id: string, component: Component): this {
    this.components.set(id, component);
    return this;
  }

  get(id: string): Component | undefined {
    return this.components.get(id);
  }

  has(id: string): boolean {
    return this.components.has(id);
  }

  ids(): string[] {
    return [...this.components.keys()];
  }

  /**
   * Memoized proxy of component `id` for `cap`.
   *
   * @throws ComponentNotFoundError when no component is registered as `id`
   * @throws InvalidCapabilityError when the component does not implement `cap`
   */
  getProxy<T>(id: string, cap: Capability<T>): T {
    return this.require(id).getProxy(cap);
  }

  /**
   * Inject `providerId`'s proxies for `capabilities` into `consumerId`.
   */
  connect(consumerId: string, providerId: string, ...capabilities: Capability[]): void {
    this.require(providerId);
    this.require(consumerId).setReference(this, providerId, ...capabilities);
  }

  /**
   * Wire `listenerId`'s register hooks to `sourceId`'s capabilities.
   */
  register(listenerId: string, sourceId: string): void {
    this.require(listenerId).register(this.require(sourceId));
  }

  unregister(listenerId: string, sourceId: string): void {
    this.require(listenerId).unregister(this.require(sourceId));
  }

  private require(id: string): Component {
    const component = this.components.get(id);
    if (!component) throw new ComponentNotFoundError(id, this.ids());
    return component;
  }
}
