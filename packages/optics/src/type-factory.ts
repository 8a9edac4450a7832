/**
 * Component type factory
 *
 * Maps an optics keyword to a builder that turns one table row into zero or
 * more components. Builders are pluggable; the defaults cover the common
 * keywords and record the settings columns each type reads.
 */

import {
  AcceleratorComponent,
  Drift,
  Marker,
  err,
  ok,
  type ComponentParams,
  type Result,
} from '@beamline/core';
import { FactoryError } from './errors';
import { column, type OpticsRow } from './schema';

export type ComponentBuilder = (row: OpticsRow, brho: number) => AcceleratorComponent[];

// =============================================================================
// Default Builders
// =============================================================================

function settings(row: OpticsRow, columns: readonly string[], brho: number): ComponentParams {
  const params: Record<string, number> = { BRHO: brho };
  for (const key of columns) {
    params[key] = column(row, key);
  }
  return params;
}

/**
 * Builder for a single component of `type` reading `columns` from the row
 */
export function simpleBuilder(type: string, columns: readonly string[] = []): ComponentBuilder {
  return (row, brho) => [new AcceleratorComponent(type, row.NAME, row.L, settings(row, columns, brho))];
}

const driftBuilder: ComponentBuilder = (row) => [new Drift(row.NAME, row.L)];

const markerBuilder: ComponentBuilder = (row) =>
  row.L > 0 ? [new Drift(row.NAME, row.L)] : [new Marker(row.NAME)];

// Rectangular bends enter and leave at half the bend angle
const rbendBuilder: ComponentBuilder = (row, brho) => {
  const angle = column(row, 'ANGLE');
  const params = { ...settings(row, ['ANGLE', 'K1L'], brho), E1: angle / 2, E2: angle / 2 };
  return [new AcceleratorComponent('SectorBend', row.NAME, row.L, params)];
};

// A combined kicker is split into a horizontal and a vertical half
const kickerBuilder: ComponentBuilder = (row, brho) => [
  new AcceleratorComponent('XCor', `${row.NAME}.H`, row.L / 2, settings(row, ['HKICK'], brho)),
  new AcceleratorComponent('YCor', `${row.NAME}.V`, row.L / 2, settings(row, ['VKICK'], brho)),
];

// Thin multipoles take the type of their highest non-zero order
const MULTIPOLE_ORDERS: ReadonlyArray<readonly [key: string, keyword: string]> = [
  ['K3L', 'OCTUPOLE'],
  ['K2L', 'SEXTUPOLE'],
  ['K2SL', 'SKEWSEXT'],
  ['K1L', 'QUADRUPOLE'],
  ['K1SL', 'SKEWQUAD'],
  ['K0L', 'SBEND'],
];

/**
 * Rewrite a MULTIPOLE row as the keyword its strengths call for. A dipole
 * kick becomes a bend of angle K0L; a multipole with no field is a marker.
 */
export function resolveMultipole(row: OpticsRow): OpticsRow {
  for (const [key, keyword] of MULTIPOLE_ORDERS) {
    const strength = column(row, key);
    if (strength !== 0) {
      return keyword === 'SBEND' ? { ...row, KEYWORD: keyword, ANGLE: strength } : { ...row, KEYWORD: keyword };
    }
  }
  return { ...row, KEYWORD: 'MARKER' };
}

export const DEFAULT_BUILDERS: Readonly<Record<string, ComponentBuilder>> = {
  DRIFT: driftBuilder,
  MARKER: markerBuilder,
  MONITOR: simpleBuilder('BPM'),
  INSTRUMENT: driftBuilder,
  QUADRUPOLE: simpleBuilder('Quadrupole', ['K1L']),
  SKEWQUAD: simpleBuilder('SkewQuadrupole', ['K1SL']),
  SBEND: simpleBuilder('SectorBend', ['ANGLE', 'K1L', 'E1', 'E2']),
  RBEND: rbendBuilder,
  SEXTUPOLE: simpleBuilder('Sextupole', ['K2L']),
  SKEWSEXT: simpleBuilder('SkewSextupole', ['K2SL']),
  OCTUPOLE: simpleBuilder('Octupole', ['K3L']),
  HKICKER: simpleBuilder('XCor', ['HKICK']),
  VKICKER: simpleBuilder('YCor', ['VKICK']),
  KICKER: kickerBuilder,
  SOLENOID: simpleBuilder('Solenoid', ['KS']),
  RFCAVITY: simpleBuilder('RFCavity', ['VOLT', 'FREQ', 'LAG']),
  RCOLLIMATOR: simpleBuilder('Collimator', ['XSIZE', 'YSIZE']),
  ECOLLIMATOR: simpleBuilder('Collimator', ['XSIZE', 'YSIZE']),
  CRABMARKER: simpleBuilder('CrabMarker', ['MUX', 'MUY']),
  CRABRF: simpleBuilder('TransverseRFStructure', ['VOLT', 'FREQ', 'LAG']),
  HEL: simpleBuilder('HollowElectronLens', ['CURRENT', 'RMIN', 'RMAX']),
};

// =============================================================================
// TypeFactory
// =============================================================================

export class TypeFactory {
  private readonly builders: Map<string, ComponentBuilder> = new Map();

  constructor(builders: Readonly<Record<string, ComponentBuilder>> = DEFAULT_BUILDERS) {
    for (const [keyword, builder] of Object.entries(builders)) {
      this.register(keyword, builder);
    }
  }

  /**
   * Add or replace the builder for `keyword`
   */
  register(keyword: string, builder: ComponentBuilder): this {
    this.builders.set(keyword.toUpperCase(), builder);
    return this;
  }

  has(keyword: string): boolean {
    return this.builders.has(keyword.toUpperCase());
  }

  keywords(): string[] {
    return Array.from(this.builders.keys()).sort();
  }

  /**
   * Build the components for one row. MULTIPOLE rows are resolved by their
   * strengths unless a MULTIPOLE builder has been registered.
   */
  create(row: OpticsRow, brho: number): Result<AcceleratorComponent[], FactoryError> {
    const keyword = row.KEYWORD.toUpperCase();
    const resolved = keyword === 'MULTIPOLE' && !this.builders.has(keyword) ? resolveMultipole(row) : row;
    const builder = this.builders.get(resolved.KEYWORD.toUpperCase());
    if (!builder) {
      return err(
        new FactoryError(`No component type for keyword ${row.KEYWORD}`, 'UNKNOWN_TYPE', row.KEYWORD)
      );
    }
    return ok(builder(resolved, brho));
  }
}
