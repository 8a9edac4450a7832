import { describe, it, expect, vi, afterEach } from 'vitest';
import { Drift, isConstructionError, type SequenceFrame } from '@beamline/core';
import { OpticsDriver, MOMENTUM_PER_RIGIDITY, constructModel } from '../driver.js';
import { DriverError } from '../errors.js';
import type { OpticsRowInput } from '../schema.js';

const CELL: OpticsRowInput[] = [
  { NAME: 'S_CELL', KEYWORD: 'LINE' },
  { NAME: 'QF', KEYWORD: 'QUADRUPOLE', L: 0.5, K1L: 0.1 },
  { NAME: 'D', KEYWORD: 'DRIFT', L: 2 },
  { NAME: 'QD', KEYWORD: 'quadrupole', L: 0.5, K1L: -0.1 },
  { NAME: 'S_CELL', KEYWORD: 'LINE' },
  { NAME: 'END', KEYWORD: 'MARKER' },
];

const childNames = (frame: SequenceFrame) => frame.getChildren().map((c) => c.getName());

describe('OpticsDriver', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('derives rigidity from momentum', () => {
    expect(new OpticsDriver({ momentum: MOMENTUM_PER_RIGIDITY }).getBrho()).toBe(1);
    expect(new OpticsDriver({ momentum: 7000 }).getBrho()).toBeCloseTo(23349.487, 3);
  });

  it('rejects invalid configuration', () => {
    expect(() => new OpticsDriver({ momentum: 0 })).toThrow(DriverError);
    try {
      new OpticsDriver({ momentum: -1 });
    } catch (error) {
      expect(error instanceof DriverError && error.code).toBe('INVALID_CONFIG');
    }
  });

  it('builds structural lines as frames', () => {
    const driver = new OpticsDriver({ momentum: MOMENTUM_PER_RIGIDITY });
    const model = driver.construct(CELL);

    const root = model.getGlobalFrame();
    expect(root.getName()).toBe('GLOBAL');
    expect(childNames(root)).toEqual(['S_CELL', 'END']);
    expect(model.getBeamline().map((f) => f.getName())).toEqual(['QF', 'D', 'QD', 'END']);
    expect(model.getArcLength()).toBe(3);
    expect(driver.getDistance()).toBe(3);
    expect(driver.getWarnings()).toEqual([]);
  });

  it('passes settings and rigidity to components', () => {
    const model = new OpticsDriver({ momentum: MOMENTUM_PER_RIGIDITY }).construct(CELL);
    const [qd] = model.extractTypedElements('Quadrupole', 'QD');
    expect(qd.getParams()).toEqual({ BRHO: 1, K1L: -0.1 });
  });

  it('ignores non-structural lines unless told otherwise', () => {
    const rows: OpticsRowInput[] = [
      { NAME: 'ARC', KEYWORD: 'LINE' },
      { NAME: 'D1', KEYWORD: 'DRIFT', L: 1 },
      { NAME: 'ARC', KEYWORD: 'LINE' },
    ];
    const flat = new OpticsDriver({ momentum: 1 }).construct(rows);
    expect(childNames(flat.getGlobalFrame())).toEqual(['D1']);

    const nested = new OpticsDriver({ momentum: 1, honourStructure: true }).construct(rows);
    expect(childNames(nested.getGlobalFrame())).toEqual(['ARC']);
  });

  it('nests lines', () => {
    const rows: OpticsRowInput[] = [
      { NAME: 'G_RING', KEYWORD: 'LINE' },
      { NAME: 'S_CELL', KEYWORD: 'LINE' },
      { NAME: 'D1', KEYWORD: 'DRIFT', L: 1 },
      { NAME: 'S_CELL', KEYWORD: 'LINE' },
      { NAME: 'D2', KEYWORD: 'DRIFT', L: 1 },
      { NAME: 'G_RING', KEYWORD: 'LINE' },
    ];
    const model = constructModel(rows, { momentum: 1, modelName: 'LHC' });
    const root = model.getGlobalFrame();
    expect(root.getName()).toBe('LHC');
    expect(childNames(root)).toEqual(['G_RING']);
    expect(model.getIndexes('D*')).toEqual([0, 1]);
    expect(model.getArcPositions()).toEqual([0, 1]);
  });

  it('flattens every line when asked', () => {
    const model = new OpticsDriver({ momentum: 1, flatLattice: true }).construct(CELL);
    expect(childNames(model.getGlobalFrame())).toEqual(['QF', 'D', 'QD', 'END']);
  });

  it('fails on an unterminated line', () => {
    try {
      new OpticsDriver({ momentum: 1 }).construct(CELL.slice(0, 3));
      expect.unreachable();
    } catch (error) {
      expect(isConstructionError(error, 'UNBALANCED_FRAMES')).toBe(true);
    }
  });

  it('builds listed keywords as drifts', () => {
    const model = new OpticsDriver({ momentum: 1, treatAsDrift: ['quadrupole'] }).construct(CELL);
    expect(model.extractTypedElements('Quadrupole')).toEqual([]);
    expect(model.getIndexes('Drift.*')).toEqual([0, 1, 2]);
  });

  it('skips zero-length rows of listed keywords', () => {
    const rows: OpticsRowInput[] = [
      { NAME: 'M0', KEYWORD: 'MARKER' },
      { NAME: 'M1', KEYWORD: 'MARKER', L: 0.25 },
    ];
    const model = new OpticsDriver({ momentum: 1, ignoreZeroLength: ['MARKER'] }).construct(rows);
    expect(model.getBeamline().map((f) => f.getName())).toEqual(['M1']);
    expect(model.getBeamline()[0].getComponent()).toBeInstanceOf(Drift);
  });

  it('replaces unknown keywords by drifts and warns', () => {
    const rows: OpticsRowInput[] = [
      { NAME: 'W1', KEYWORD: 'WIGGLER', L: 1 },
      { NAME: 'X1', KEYWORD: 'PLACEHOLDER' },
    ];
    const driver = new OpticsDriver({ momentum: 1 });
    const model = driver.construct(rows);

    expect(model.getIndexes('Drift.W1')).toEqual([0]);
    expect(model.lattice.size()).toBe(1);
    expect(driver.getWarnings()).toEqual([
      'No component type for keyword WIGGLER: W1 replaced by a drift of 1 m',
      'No component type for keyword PLACEHOLDER: zero-length X1 ignored',
    ]);
  });

  it('prints warnings only when logging', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const rows: OpticsRowInput[] = [{ NAME: 'W1', KEYWORD: 'WIGGLER', L: 1 }];

    new OpticsDriver({ momentum: 1 }).construct(rows);
    expect(warn).not.toHaveBeenCalled();

    new OpticsDriver({ momentum: 1, logging: true }).construct(rows);
    expect(warn).toHaveBeenCalledWith('[OpticsDriver] No component type for keyword WIGGLER: W1 replaced by a drift of 1 m');
  });

  it('rejects malformed rows with their position', () => {
    const rows = [{ NAME: 'D1', KEYWORD: 'DRIFT', L: 1 }, { NAME: 'Q1', KEYWORD: 'QUADRUPOLE', L: -1 }];
    try {
      new OpticsDriver({ momentum: 1 }).construct(rows);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DriverError);
      if (error instanceof DriverError) {
        expect(error.code).toBe('INVALID_ROW');
        expect(error.context?.row).toBe(1);
        expect(error.message.startsWith('Invalid optics row 1: L: ')).toBe(true);
      }
    }
  });

  it('resets between constructions', () => {
    const driver = new OpticsDriver({ momentum: 1 });
    driver.construct([{ NAME: 'W1', KEYWORD: 'WIGGLER', L: 1 }]);
    driver.construct([{ NAME: 'D1', KEYWORD: 'DRIFT', L: 4 }]);
    expect(driver.getWarnings()).toEqual([]);
    expect(driver.getDistance()).toBe(4);
  });

  it('builds line frames with the configured origin', () => {
    const model = new OpticsDriver({ momentum: 1, lineOrigin: 'centre' }).construct(CELL);
    const [cell] = model.getGlobalFrame().getChildren();
    expect(cell.kind === 'sequence' && cell.getOrigin()).toBe('centre');
  });

  describe('single-cell RF', () => {
    // 149.896229 MHz has a wavelength of 2 m
    const RF: OpticsRowInput[] = [{ NAME: 'RF1', KEYWORD: 'RFCAVITY', L: 3, VOLT: 2, FREQ: 149.896229 }];

    it('keeps cavities whole by default', () => {
      const model = new OpticsDriver({ momentum: 1 }).construct(RF);
      expect(model.getBeamline().map((f) => f.getGeometryLength())).toEqual([3]);
    });

    it('shortens cavities to half a wavelength and drifts the rest', () => {
      const driver = new OpticsDriver({ momentum: 1, singleCellRF: true });
      const model = driver.construct(RF);
      const [cavity, rest] = model.getBeamline();

      expect(model.lattice.size()).toBe(2);
      expect(cavity.getComponent()?.getQualifiedName()).toBe('RFCavity.RF1');
      expect(cavity.getGeometryLength()).toBeCloseTo(1, 9);
      expect(cavity.getComponent()?.getParam('VOLT')).toBe(2);
      expect(rest.getComponent()?.getQualifiedName()).toBe('Drift.RF1.DRIFT');
      expect(rest.getGeometryLength()).toBeCloseTo(2, 9);
      expect(driver.getDistance()).toBeCloseTo(3, 9);
    });

    it('leaves cavities shorter than a cell alone', () => {
      const rows: OpticsRowInput[] = [{ NAME: 'RF2', KEYWORD: 'RFCAVITY', L: 0.5, FREQ: 149.896229 }];
      const model = new OpticsDriver({ momentum: 1, singleCellRF: true }).construct(rows);
      expect(model.getBeamline().map((f) => f.getGeometryLength())).toEqual([0.5]);
    });
  });

  describe('appendModel', () => {
    it('chains tables into one model, keeping open lines and distance', () => {
      const driver = new OpticsDriver({ momentum: 1 });
      driver.appendModel([
        { NAME: 'S_ARC', KEYWORD: 'LINE' },
        { NAME: 'D1', KEYWORD: 'DRIFT', L: 1 },
      ]);
      expect(driver.getDistance()).toBe(1);
      driver.appendModel([
        { NAME: 'D2', KEYWORD: 'DRIFT', L: 2 },
        { NAME: 'S_ARC', KEYWORD: 'LINE' },
      ]);

      const model = driver.getModel();
      expect(childNames(model.getGlobalFrame())).toEqual(['S_ARC']);
      expect(model.getBeamline().map((f) => f.getName())).toEqual(['D1', 'D2']);
      expect(driver.getDistance()).toBe(3);
      expect(driver.getModelConstructor()).toBeNull();
    });

    it('builds appended rows with a new momentum', () => {
      const driver = new OpticsDriver({ momentum: MOMENTUM_PER_RIGIDITY });
      driver.appendModel([{ NAME: 'Q1', KEYWORD: 'QUADRUPOLE', L: 1, K1L: 0.1 }]);
      driver.appendModel([{ NAME: 'Q2', KEYWORD: 'QUADRUPOLE', L: 1, K1L: 0.1 }], 2 * MOMENTUM_PER_RIGIDITY);

      const model = driver.getModel();
      expect(driver.getMomentum()).toBe(2 * MOMENTUM_PER_RIGIDITY);
      expect(model.extractTypedElements('Quadrupole').map((q) => q.getParam('BRHO'))).toEqual([1, 2]);
    });

    it('refuses to hand over a model that was never started', () => {
      try {
        new OpticsDriver({ momentum: 1 }).getModel();
        expect.unreachable();
      } catch (error) {
        expect(error instanceof DriverError && error.code).toBe('NO_MODEL');
      }
    });
  });

  describe('setMomentum', () => {
    it('changes the rigidity', () => {
      const driver = new OpticsDriver({ momentum: 1 });
      driver.setMomentum(MOMENTUM_PER_RIGIDITY);
      expect(driver.getBrho()).toBe(1);
    });

    it('rejects non-positive momenta', () => {
      const driver = new OpticsDriver({ momentum: 1 });
      expect(() => driver.setMomentum(0)).toThrow(DriverError);
      expect(driver.getMomentum()).toBe(1);
    });
  });
});
