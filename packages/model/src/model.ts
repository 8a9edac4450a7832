/**
 * Accelerator model
 *
 * Owns the global frame, the element registry and the flat lattice. Models
 * are assembled by ModelConstructor; once handed out they are only queried.
 */

import {
  AcceleratorComponent,
  compilePattern,
  invariant,
  type ComponentFrame,
  type LatticeFrame,
  type ModelElement,
  type SequenceFrame,
} from '@beamline/core';
import { FlatLattice } from './lattice';
import { ElementRegistry } from './registry';

export class AcceleratorModel {
  readonly elements: ElementRegistry = new ElementRegistry();
  readonly lattice: FlatLattice = new FlatLattice();

  constructor(private readonly globalFrame: SequenceFrame) {}

  getGlobalFrame(): SequenceFrame {
    return this.globalFrame;
  }

  getElements(): ElementRegistry {
    return this.elements;
  }

  getLattice(): FlatLattice {
    return this.lattice;
  }

  /**
   * Total arc length of the beamline
   */
  getArcLength(): number {
    return this.globalFrame.getGeometryLength();
  }

  // ==================== Lattice Queries ====================

  /**
   * Lattice entries from `start` to `end` inclusive; the whole lattice by default
   */
  getBeamline(start: number = 0, end: number = this.lattice.size() - 1): ComponentFrame[] {
    const size = this.lattice.size();
    invariant(
      Number.isInteger(start) && Number.isInteger(end) && start >= 0 && start <= end + 1 && end < size,
      'BEAMLINE_RANGE',
      `Beamline range [${start}, ${end}] outside lattice of ${size} entries`,
      { start, end, size }
    );
    return this.lattice.range(start, end);
  }

  /**
   * Indices of lattice entries matching a wildcard pattern. A pattern with a
   * `.` is matched against `Type.Name` of the carried component, otherwise
   * against the name alone.
   */
  getIndexes(pattern: string): number[] {
    const regex = compilePattern(pattern);
    const qualified = pattern.includes('.');
    const indexes: number[] = [];

    let index = 0;
    for (const frame of this.lattice) {
      const target: ModelElement = frame.getComponent() ?? frame;
      if (regex.test(qualified ? target.getQualifiedName() : target.getName())) {
        indexes.push(index);
      }
      index++;
    }

    return indexes;
  }

  /**
   * Registered components of `type` whose names match `namePattern`
   */
  extractTypedElements(type: string, namePattern: string = '*'): AcceleratorComponent[] {
    const regex = compilePattern(namePattern);
    return this.elements
      .filter((element): element is AcceleratorComponent => element instanceof AcceleratorComponent)
      .filter((component) => component.getType() === type && regex.test(component.getName()));
  }

  // ==================== Geometry ====================

  /**
   * Arc position of the entrance of every lattice entry, by lattice index
   */
  getArcPositions(): number[] {
    const positions = new Map<ComponentFrame, number>();

    const walk = (frame: LatticeFrame, s: number): number => {
      if (frame.kind === 'component') {
        positions.set(frame, s);
        return s + frame.getGeometryLength();
      }
      let exit = s;
      for (const child of frame.getChildren()) {
        exit = walk(child, exit);
      }
      return exit;
    };
    walk(this.globalFrame, 0);

    return this.lattice.toArray().map((frame) => {
      const s = positions.get(frame);
      invariant(
        s !== undefined,
        'INVALID_ARGUMENT',
        `Lattice entry ${frame.getName()} is not placed under ${this.globalFrame.getName()}`,
        { index: frame.getBeamlineIndex() }
      );
      return s;
    });
  }
}
