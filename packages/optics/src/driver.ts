/**
 * OpticsDriver - Builds a model from optics table rows
 *
 * Walks the rows of an already-parsed optics table in order and turns each
 * into ModelConstructor calls. LINE rows bracket nested frames: the first
 * occurrence of a line name opens a frame, the next one closes it. Several
 * tables can be chained into one model with appendModel.
 */

import { AcceleratorComponent, ComponentFrame, Drift, SequenceFrame } from '@beamline/core';
import { ModelConstructor, type AcceleratorModel } from '@beamline/model';
import { DriverError } from './errors';
import {
  DriverConfigSchema,
  OpticsRowSchema,
  type DriverConfig,
  type OpticsRow,
  type ResolvedDriverConfig,
} from './schema';
import { TypeFactory } from './type-factory';

/** GeV/c per T·m for a singly charged particle */
export const MOMENTUM_PER_RIGIDITY = 0.299792458;

/** m/s */
export const SPEED_OF_LIGHT = 299792458;

// Without honourStructure only these lines become frames
const STRUCTURAL_LINE = /^[MSG]_/;

export class OpticsDriver {
  private readonly config: ResolvedDriverConfig;
  private readonly ignoreZeroLength: Set<string>;
  private readonly treatAsDrift: Set<string>;
  private momentum: number;
  private modelConstructor: ModelConstructor | null = null;
  private openLines: string[] = [];
  private distance = 0;
  private warnings: string[] = [];

  constructor(
    config: DriverConfig,
    private readonly factory: TypeFactory = new TypeFactory()
  ) {
    const parsed = DriverConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new DriverError(
        `Invalid driver configuration: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
        'INVALID_CONFIG',
        { issues: parsed.error.issues }
      );
    }
    this.config = parsed.data;
    this.momentum = this.config.momentum;
    this.ignoreZeroLength = new Set(this.config.ignoreZeroLength.map((k) => k.toUpperCase()));
    this.treatAsDrift = new Set(this.config.treatAsDrift.map((k) => k.toUpperCase()));
  }

  /** Reference momentum in GeV/c */
  getMomentum(): number {
    return this.momentum;
  }

  /**
   * Change the reference momentum. Rows appended from now on are built
   * with the new rigidity; components already built keep theirs.
   */
  setMomentum(momentum: number): void {
    const parsed = DriverConfigSchema.shape.momentum.safeParse(momentum);
    if (!parsed.success) {
      throw new DriverError(`Invalid momentum ${momentum}`, 'INVALID_CONFIG', { issues: parsed.error.issues });
    }
    this.momentum = parsed.data;
  }

  /**
   * Magnetic rigidity for the reference momentum, in T·m
   */
  getBrho(): number {
    return this.momentum / MOMENTUM_PER_RIGIDITY;
  }

  /** Distance along the beamline reached so far */
  getDistance(): number {
    return this.distance;
  }

  /** Warnings raised since the current model was started */
  getWarnings(): readonly string[] {
    return this.warnings;
  }

  /** The constructor of the model in progress, if any */
  getModelConstructor(): ModelConstructor | null {
    return this.modelConstructor;
  }

  /**
   * Build a model from `rows`. Frames left open by the rows make the final
   * finish() fail.
   */
  construct(rows: Iterable<unknown>): AcceleratorModel {
    this.begin();
    this.appendRows(rows);
    return this.getModel();
  }

  /**
   * Append another table to the model in progress, starting one if there
   * is none. Distance and open lines carry over from the previous table.
   */
  appendModel(rows: Iterable<unknown>, momentum?: number): void {
    if (momentum !== undefined) {
      this.setMomentum(momentum);
    }
    if (!this.modelConstructor) {
      this.begin();
    }
    this.appendRows(rows);
  }

  /**
   * Finish the model in progress and hand it over
   */
  getModel(): AcceleratorModel {
    const modelConstructor = this.modelConstructor;
    if (!modelConstructor) {
      throw new DriverError('No model in progress', 'NO_MODEL');
    }

    const model = modelConstructor.finish();
    this.modelConstructor = null;
    this.openLines = [];
    this.log(`Constructed ${model.lattice.size()} components over ${this.distance} m`);
    return model;
  }

  private begin(): void {
    this.modelConstructor = new ModelConstructor({
      rootName: this.config.modelName,
      trace: this.config.logging,
    });
    this.openLines = [];
    this.distance = 0;
    this.warnings = [];
  }

  private appendRows(rows: Iterable<unknown>): void {
    const modelConstructor = this.modelConstructor;
    if (!modelConstructor) {
      throw new DriverError('No model in progress', 'NO_MODEL');
    }
    const brho = this.getBrho();

    let index = 0;
    for (const raw of rows) {
      const row = this.parseRow(raw, index++);

      if (row.KEYWORD === 'LINE') {
        this.handleLine(row.NAME, modelConstructor);
        continue;
      }

      if (row.L === 0 && this.ignoreZeroLength.has(row.KEYWORD)) {
        this.log(`Skipping zero-length ${row.KEYWORD} ${row.NAME}`);
        continue;
      }

      for (const component of this.buildComponents(row, brho)) {
        modelConstructor.appendComponentFrame(new ComponentFrame(component));
        this.distance += component.getLength();
      }
    }
  }

  private parseRow(raw: unknown, index: number): OpticsRow {
    const parsed = OpticsRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DriverError(
        `Invalid optics row ${index}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        'INVALID_ROW',
        { row: index, issues: parsed.error.issues }
      );
    }
    return parsed.data;
  }

  private handleLine(name: string, modelConstructor: ModelConstructor): void {
    if (this.config.flatLattice) {
      return;
    }
    if (!this.config.honourStructure && !STRUCTURAL_LINE.test(name)) {
      return;
    }

    if (this.openLines[this.openLines.length - 1] === name) {
      this.openLines.pop();
      modelConstructor.closeFrame();
    } else {
      this.openLines.push(name);
      modelConstructor.openFrame(new SequenceFrame(name, this.config.lineOrigin));
    }
  }

  private buildComponents(row: OpticsRow, brho: number): AcceleratorComponent[] {
    if (this.treatAsDrift.has(row.KEYWORD)) {
      return [new Drift(row.NAME, row.L)];
    }

    const result = this.factory.create(row, brho);
    if (result.ok) {
      return this.config.singleCellRF ? result.value.flatMap((c) => this.singleCell(c)) : result.value;
    }

    if (row.L > 0) {
      this.warn(`${result.error.message}: ${row.NAME} replaced by a drift of ${row.L} m`);
      return [new Drift(row.NAME, row.L)];
    }
    this.warn(`${result.error.message}: zero-length ${row.NAME} ignored`);
    return [];
  }

  // Half a wavelength of cavity, the rest of its length as drift. FREQ is in MHz.
  private singleCell(component: AcceleratorComponent): AcceleratorComponent[] {
    const freq = component.getParam('FREQ') ?? 0;
    if (component.getType() !== 'RFCavity' || freq <= 0) {
      return [component];
    }

    const cell = SPEED_OF_LIGHT / (freq * 1e6) / 2;
    const length = component.getLength();
    if (cell >= length) {
      return [component];
    }

    this.log(`Shortening ${component.getName()} to a single cell of ${cell} m`);
    return [
      new AcceleratorComponent(component.getType(), component.getName(), cell, component.getParams()),
      new Drift(`${component.getName()}.DRIFT`, length - cell),
    ];
  }

  private log(message: string): void {
    if (this.config.logging) {
      console.log(`[OpticsDriver] ${message}`);
    }
  }

  private warn(message: string): void {
    this.warnings.push(message);
    if (this.config.logging) {
      console.warn(`[OpticsDriver] ${message}`);
    }
  }
}

/**
 * Build a model from optics rows with the default type factory
 */
export function constructModel(rows: Iterable<unknown>, config: DriverConfig): AcceleratorModel {
  return new OpticsDriver(config).construct(rows);
}
