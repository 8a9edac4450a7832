/**
 * Model statistics
 *
 * Summarises a model without touching it: arc length, how many lattice
 * entries and registered elements it has, and how many of each type.
 */

import type { AcceleratorModel } from './model';

export interface TypeCount {
  type: string;
  count: number;
}

export interface ModelStatistics {
  arcLength: number;
  /** Flat lattice entries */
  componentCount: number;
  /** Registered elements of every kind */
  elementCount: number;
  /** Ordered by type tag */
  types: TypeCount[];
}

/**
 * Anything text can be written to: a stream, a buffer, a test double
 */
export interface StatisticsSink {
  write(text: string): unknown;
}

const TYPE_COLUMN_WIDTH = 20;

export function computeStatistics(model: AcceleratorModel): ModelStatistics {
  const types = Array.from(model.elements.countByType(), ([type, count]) => ({ type, count }));
  types.sort((a, b) => (a.type < b.type ? -1 : a.type > b.type ? 1 : 0));

  return {
    arcLength: model.getArcLength(),
    componentCount: model.lattice.size(),
    elementCount: model.elements.size(),
    types,
  };
}

export function formatStatistics(stats: ModelStatistics): string {
  const lines = [
    `Arc length of beamline:     ${stats.arcLength} meter`,
    `Total number of components: ${stats.componentCount}`,
    `Total number of elements:   ${stats.elementCount}`,
    '',
    'Model Element statistics',
    '------------------------',
    '',
    ...stats.types.map(({ type, count }) => `${type.padEnd(TYPE_COLUMN_WIDTH)}${count}`),
    '',
  ];
  return lines.join('\n') + '\n';
}

export function reportStatistics(model: AcceleratorModel, sink: StatisticsSink): ModelStatistics {
  const stats = computeStatistics(model);
  sink.write(formatStatistics(stats));
  return stats;
}
