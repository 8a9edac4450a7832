/**
 * @beamline/optics - Models from optics tables
 *
 * - TypeFactory: keyword → component builders
 * - OpticsDriver: table rows → ModelConstructor calls
 */

export * from './schema';
export * from './errors';
export * from './type-factory';
export * from './driver';
