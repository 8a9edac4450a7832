/**
 * Accelerator components
 *
 * Placeholders for the physical elements of a beamline. They carry a type
 * tag, a length and their settings; field maps and tracking belong to the
 * code that consumes the flat lattice.
 */

import { ModelElement } from './element';
import { ConstructionError } from './errors';
import { ComponentParamsSchema, type ComponentParams, type Extent } from './types';

export class AcceleratorComponent extends ModelElement implements Extent {
  private readonly params: ComponentParams;

  constructor(
    private readonly componentType: string,
    name: string,
    private readonly length: number,
    params: ComponentParams = {}
  ) {
    super(name);
    if (!Number.isFinite(length) || length < 0) {
      throw new ConstructionError(
        `Component ${componentType}.${name} has invalid length ${length}`,
        'INVALID_ARGUMENT',
        { length }
      );
    }

    const parsed = ComponentParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new ConstructionError(
        `Component ${componentType}.${name} has invalid settings: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        'INVALID_ARGUMENT',
        { issues: parsed.error.issues }
      );
    }
    this.params = Object.freeze(parsed.data);
  }

  getType(): string {
    return this.componentType;
  }

  getLength(): number {
    return this.length;
  }

  getGeometryLength(): number {
    return this.length;
  }

  getParams(): ComponentParams {
    return this.params;
  }

  getParam(key: string): number | undefined {
    return this.params[key];
  }
}

/**
 * Field-free region
 */
export class Drift extends AcceleratorComponent {
  constructor(name: string, length: number) {
    super('Drift', name, length);
  }
}

/**
 * Zero-length reference point
 */
export class Marker extends AcceleratorComponent {
  constructor(name: string) {
    super('Marker', name, 0);
  }
}
