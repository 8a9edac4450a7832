/**
 * @beamline/core - Building blocks of a beamline model
 *
 * - Elements: the identity-bearing base of everything a model owns
 * - Components: typed placeholders for physical elements
 * - Frames: sequences and component occurrences, with geometry
 * - Traversal: pre-order walks in beamline order
 */

export * from './types';
export * from './errors';
export * from './result';
export * from './element';
export * from './components';
export * from './frames';
export * from './traversal';
export * from './pattern';
