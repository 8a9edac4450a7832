/**
 * @beamline/model - Accelerator model and its constructor
 *
 * ModelConstructor builds an AcceleratorModel from nested frame
 * open/close/append calls, keeping the element registry and the flat
 * lattice consistent with the frame tree.
 */

export * from './registry';
export * from './lattice';
export * from './model';
export * from './statistics';
export * from './constructor';
