/**
 * Core types for the beamline model
 */

import { z } from 'zod';

// =============================================================================
// Frame Origin
// =============================================================================

export const OriginPolicySchema = z.enum([
  'entrance', // s = 0 at the upstream face
  'centre',   // s = 0 at the geometric middle
  'exit',     // s = 0 at the downstream face
]);

export type OriginPolicy = z.infer<typeof OriginPolicySchema>;

// =============================================================================
// Frame Kinds
// =============================================================================

export type FrameKind = 'sequence' | 'component';

// =============================================================================
// Component Parameters
// =============================================================================

/**
 * Named numeric settings of a component (strengths, angles, voltages).
 * Opaque to the construction engine.
 */
export const ComponentParamsSchema = z.record(z.number().finite());

export type ComponentParams = Readonly<z.infer<typeof ComponentParamsSchema>>;

// =============================================================================
// Geometry
// =============================================================================

export interface ChildPlacement<T> {
  child: T;
  /** Position of the child's entrance relative to the parent origin */
  entrance: number;
  /** Position of the child's exit relative to the parent origin */
  exit: number;
}

/** Anything that occupies a stretch of the reference orbit */
export interface Extent {
  getGeometryLength(): number;
}
