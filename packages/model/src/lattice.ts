/**
 * Flat lattice
 *
 * The beamline as tracking code sees it: component occurrences in physical
 * order. Append-only. An occurrence's index is fixed when it is pushed and
 * is never renumbered, because downstream code addresses components by it.
 */

import { invariant, type ComponentFrame } from '@beamline/core';

export class FlatLattice implements Iterable<ComponentFrame> {
  private readonly entries: ComponentFrame[] = [];
  private readonly placed: Set<ComponentFrame> = new Set();

  /**
   * Append an occurrence and stamp it with its index
   */
  push(frame: ComponentFrame): number {
    invariant(
      !this.placed.has(frame),
      'OCCURRENCE_ALREADY_PLACED',
      `${frame.getName()} already occupies lattice slot ${frame.getBeamlineIndex()}`,
      { name: frame.getName(), index: frame.getBeamlineIndex() }
    );

    this.entries.push(frame);
    this.placed.add(frame);
    const index = this.entries.length - 1;
    frame.setBeamlineIndex(index);
    return index;
  }

  size(): number {
    return this.entries.length;
  }

  at(index: number): ComponentFrame | undefined {
    return this.entries[index];
  }

  contains(frame: ComponentFrame): boolean {
    return this.placed.has(frame);
  }

  /**
   * Entries `start` through `end`, both inclusive
   */
  range(start: number, end: number): ComponentFrame[] {
    return this.entries.slice(start, end + 1);
  }

  toArray(): ComponentFrame[] {
    return [...this.entries];
  }

  [Symbol.iterator](): Iterator<ComponentFrame> {
    return this.entries[Symbol.iterator]();
  }
}
