/**
 * Model elements
 *
 * Base of everything a model owns: frames, component occurrences and the
 * components themselves. Identity is object identity; two structurally equal
 * elements are still two elements.
 */

export abstract class ModelElement {
  constructor(private readonly elementName: string) {}

  getName(): string {
    return this.elementName;
  }

  /** Type tag used for statistics and pattern queries */
  abstract getType(): string;

  /** `Type.Name`, as matched by model queries */
  getQualifiedName(): string {
    return `${this.getType()}.${this.elementName}`;
  }
}
