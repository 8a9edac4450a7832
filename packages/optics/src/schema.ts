/**
 * Optics table schemas
 *
 * Rows arrive already parsed (one record per table line); these schemas
 * check them before anything is built.
 */

import { OriginPolicySchema } from '@beamline/core';
import { z } from 'zod';

// =============================================================================
// Table Rows
// =============================================================================

export const OpticsRowSchema = z
  .object({
    NAME: z.string().min(1),
    KEYWORD: z.string().min(1).transform((keyword) => keyword.toUpperCase()),
    L: z.number().nonnegative().default(0),
  })
  .catchall(z.union([z.number(), z.string()]));

export type OpticsRow = z.infer<typeof OpticsRowSchema>;
export type OpticsRowInput = z.input<typeof OpticsRowSchema>;

/**
 * Numeric column of a row; missing or non-numeric columns read as zero
 */
export function column(row: OpticsRow, key: string): number {
  const value = row[key];
  return typeof value === 'number' ? value : 0;
}

// =============================================================================
// Driver Configuration
// =============================================================================

export const DriverConfigSchema = z.object({
  /** Reference momentum in GeV/c */
  momentum: z.number().positive(),
  /** Build a frame for every LINE, not only M_/S_/G_ prefixed ones */
  honourStructure: z.boolean().default(false),
  /** Ignore LINE rows altogether */
  flatLattice: z.boolean().default(false),
  /** Keywords skipped when their length is zero */
  ignoreZeroLength: z.array(z.string()).default([]),
  /** Keywords built as plain drifts */
  treatAsDrift: z.array(z.string()).default([]),
  /** Shorten RF cavities to half a wavelength, followed by a drift */
  singleCellRF: z.boolean().default(false),
  /** Origin policy of frames built from lines */
  lineOrigin: OriginPolicySchema.default('entrance'),
  /** Name of the root frame */
  modelName: z.string().min(1).default('GLOBAL'),
  /** Log construction to the console */
  logging: z.boolean().default(false),
});

export type DriverConfig = z.input<typeof DriverConfigSchema>;
export type ResolvedDriverConfig = z.infer<typeof DriverConfigSchema>;
