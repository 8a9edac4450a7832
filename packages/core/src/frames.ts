/**
 * Lattice frames
 *
 * A frame is either a sequence (an ordered container of sub-frames) or a
 * component occurrence (one placed reference to a component). The two form
 * a closed union discriminated by `kind`, so callers branch on the tag
 * instead of probing with instanceof.
 */

import type { AcceleratorComponent } from './components';
import { ModelElement } from './element';
import { invariant } from './errors';
import type { ChildPlacement, Extent, FrameKind, OriginPolicy } from './types';

export type LatticeFrame = SequenceFrame | ComponentFrame;

abstract class FrameBase extends ModelElement implements Extent {
  abstract readonly kind: FrameKind;
  private superFrame: SequenceFrame | null = null;

  abstract getGeometryLength(): number;

  getSuperFrame(): SequenceFrame | null {
    return this.superFrame;
  }

  /**
   * Record the containing frame. Called by SequenceFrame.appendFrame.
   */
  setSuperFrame(frame: SequenceFrame | null): void {
    this.superFrame = frame;
  }

  isComponentFrame(): this is ComponentFrame {
    return this.kind === 'component';
  }

  asComponentFrame(): ComponentFrame | null {
    return this.isComponentFrame() ? this : null;
  }
}

// =============================================================================
// Sequence Frame
// =============================================================================

export class SequenceFrame extends FrameBase {
  readonly kind = 'sequence' as const;
  private readonly children: LatticeFrame[] = [];
  private consolidated = false;
  private consolidatedLength: number | null = null;

  constructor(name: string, private readonly origin: OriginPolicy = 'entrance') {
    super(name);
  }

  getType(): string {
    return 'SequenceFrame';
  }

  getOrigin(): OriginPolicy {
    return this.origin;
  }

  /**
   * Append a frame after the current last child
   */
  appendFrame(frame: LatticeFrame): void {
    invariant(
      !this.consolidated,
      'FRAME_CONSOLIDATED',
      `Cannot append ${frame.getName()} to consolidated frame ${this.getName()}`,
      { frame: this.getName() }
    );
    invariant(
      !this.isWithin(frame),
      'INVALID_ARGUMENT',
      `Frame ${frame.getName()} cannot be nested inside itself`,
      { frame: frame.getName() }
    );

    this.children.push(frame);
    frame.setSuperFrame(this);
  }

  getChildren(): readonly LatticeFrame[] {
    return this.children;
  }

  size(): number {
    return this.children.length;
  }

  isConsolidated(): boolean {
    return this.consolidated;
  }

  /**
   * Freeze this frame and every sequence below it. Lengths are cached from
   * here on; further appends throw.
   */
  consolidate(): void {
    if (this.consolidated) {
      return;
    }

    for (const child of this.children) {
      if (child.kind === 'sequence') {
        child.consolidate();
      }
    }

    this.consolidatedLength = this.sumChildLengths();
    this.consolidated = true;
  }

  getGeometryLength(): number {
    return this.consolidatedLength ?? this.sumChildLengths();
  }

  /**
   * Entrance and exit of each child, measured from this frame's origin
   */
  getChildPlacements(): ChildPlacement<LatticeFrame>[] {
    let s = this.originOffset();
    return this.children.map((child) => {
      const entrance = s;
      s += child.getGeometryLength();
      return { child, entrance, exit: s };
    });
  }

  private originOffset(): number {
    switch (this.origin) {
      case 'entrance':
        return 0;
      case 'centre':
        return -this.getGeometryLength() / 2;
      case 'exit':
        return -this.getGeometryLength();
    }
  }

  private sumChildLengths(): number {
    return this.children.reduce((sum, child) => sum + child.getGeometryLength(), 0);
  }

  /**
   * True when `frame` is this frame or one of its ancestors
   */
  isWithin(frame: LatticeFrame): boolean {
    let current: SequenceFrame | null = this;
    while (current) {
      if (current === frame) {
        return true;
      }
      current = current.getSuperFrame();
    }
    return false;
  }
}

// =============================================================================
// Component Frame
// =============================================================================

/**
 * One placement of a component in the beamline. Several occurrences may
 * share the same component instance; an occurrence may also be empty.
 */
export class ComponentFrame<C extends AcceleratorComponent = AcceleratorComponent> extends FrameBase {
  readonly kind = 'component' as const;
  private beamlineIndex: number | null = null;

  constructor(private readonly component: C | null, name?: string) {
    super(name ?? component?.getName() ?? 'EMPTY');
  }

  getType(): string {
    return 'ComponentFrame';
  }

  carriesComponent(): boolean {
    return this.component !== null;
  }

  getComponent(): C | null {
    return this.component;
  }

  getGeometryLength(): number {
    return this.component?.getGeometryLength() ?? 0;
  }

  /** Position in the flat lattice, or null before placement */
  getBeamlineIndex(): number | null {
    return this.beamlineIndex;
  }

  setBeamlineIndex(index: number): void {
    invariant(
      Number.isInteger(index) && index >= 0,
      'INVALID_ARGUMENT',
      `Invalid beamline index ${index}`,
      { index }
    );
    this.beamlineIndex = index;
  }
}
