/**
 * Frame traversal
 *
 * Depth-first, pre-order: a frame is visited before its children, and each
 * sub-sequence is exhausted before its next sibling. The visit order is the
 * physical order of the beamline.
 */

import type { ComponentFrame, LatticeFrame } from './frames';

export interface FrameTraverser {
  actOn(frame: LatticeFrame): void;
}

export function traverse(frame: LatticeFrame, traverser: FrameTraverser): void {
  traverser.actOn(frame);
  if (frame.kind === 'sequence') {
    for (const child of frame.getChildren()) {
      traverse(child, traverser);
    }
  }
}

/**
 * Adapt a plain callback to the traverser interface
 */
export function traverser(actOn: (frame: LatticeFrame) => void): FrameTraverser {
  return { actOn };
}

/**
 * Component occurrences below (and including) `frame`, in beamline order
 */
export function collectComponentFrames(frame: LatticeFrame): ComponentFrame[] {
  const found: ComponentFrame[] = [];
  traverse(
    frame,
    traverser((visited) => {
      if (visited.kind === 'component') {
        found.push(visited);
      }
    })
  );
  return found;
}

/**
 * Every frame below (and including) `frame`, in visit order
 */
export function flattenFrames(frame: LatticeFrame): LatticeFrame[] {
  const found: LatticeFrame[] = [];
  traverse(frame, traverser((visited) => found.push(visited)));
  return found;
}
