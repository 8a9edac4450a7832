/**
 * Element registry
 *
 * The single owner of every element in a model. Elements are stored once,
 * in registration order, and keyed by identity; each gets a stable numeric
 * handle that never changes for the life of the registry.
 */

import type { ModelElement } from '@beamline/core';

export type ElementHandle = number;

export class ElementRegistry implements Iterable<ModelElement> {
  private readonly elements: ModelElement[] = [];
  private readonly handles: Map<ModelElement, ElementHandle> = new Map();

  /**
   * Register an element. Returns false when it is already registered.
   */
  add(element: ModelElement): boolean {
    if (this.handles.has(element)) {
      return false;
    }

    this.handles.set(element, this.elements.length);
    this.elements.push(element);
    return true;
  }

  has(element: ModelElement): boolean {
    return this.handles.has(element);
  }

  handleOf(element: ModelElement): ElementHandle | undefined {
    return this.handles.get(element);
  }

  get(handle: ElementHandle): ModelElement | undefined {
    return this.elements[handle];
  }

  size(): number {
    return this.elements.length;
  }

  values(): readonly ModelElement[] {
    return this.elements;
  }

  filter<T extends ModelElement>(predicate: (element: ModelElement) => element is T): T[] {
    return this.elements.filter(predicate);
  }

  /**
   * Number of registered elements per type tag
   */
  countByType(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const element of this.elements) {
      const type = element.getType();
      counts.set(type, (counts.get(type) ?? 0) + 1);
    }
    return counts;
  }

  [Symbol.iterator](): Iterator<ModelElement> {
    return this.elements[Symbol.iterator]();
  }
}
