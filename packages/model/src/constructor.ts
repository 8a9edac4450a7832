/**
 * ModelConstructor - Stack-discipline model builder
 *
 * A driver opens and closes nested frames and appends components or whole
 * pre-built sub-frames. Every append registers new elements exactly once and
 * pushes component occurrences onto the flat lattice in beamline order, so
 * the finished model carries both the frame tree (geometry, organisation)
 * and the flat lattice (tracking).
 *
 * States:
 *   idle ──startNewModel──▶ building ──finish──▶ finalized
 *                            ▲   │                   │
 *                            └───┘ open/close/append │
 *   building ◀────────────────────── startNewModel ──┘
 */

import {
  ComponentFrame,
  ConstructionError,
  Drift,
  SequenceFrame,
  collectComponentFrames,
  invariant,
  traverse,
  type FrameTraverser,
  type LatticeFrame,
  type ModelElement,
  type OriginPolicy,
} from '@beamline/core';
import { AcceleratorModel } from './model';
import type { FlatLattice } from './lattice';
import type { ElementRegistry } from './registry';
import { reportStatistics, type ModelStatistics, type StatisticsSink } from './statistics';

// =============================================================================
// Configuration
// =============================================================================

export interface ConstructorConfig {
  /** Name of the root frame */
  rootName?: string;
  /** Origin policy of the root frame */
  rootOrigin?: OriginPolicy;
  /** Name given to drifts built by appendDrift */
  driftName?: string;
  /** Start a model on construction */
  autoStart?: boolean;
  /** Log construction steps */
  trace?: boolean;
}

const DEFAULT_CONFIG: Required<ConstructorConfig> = {
  rootName: 'GLOBAL',
  rootOrigin: 'entrance',
  driftName: 'UNNAMED',
  autoStart: true,
  trace: false,
};

// =============================================================================
// State Machine
// =============================================================================

export type ConstructorState = 'idle' | 'building' | 'finalized';

const STATE_TRANSITIONS: Record<ConstructorState, ConstructorState[]> = {
  idle: ['building'],
  building: ['building', 'finalized'],
  finalized: ['building'],
};

// =============================================================================
// Element Extraction
// =============================================================================

/**
 * Registers everything it visits; component occurrences additionally get
 * their component registered and a lattice slot.
 */
class ElementExtractor implements FrameTraverser {
  constructor(
    private readonly elements: ElementRegistry,
    private readonly lattice: FlatLattice
  ) {}

  actOn(frame: LatticeFrame): void {
    this.elements.add(frame);
    if (frame.kind !== 'component') {
      return;
    }

    const component = frame.getComponent();
    if (component) {
      this.elements.add(component);
    }
    this.lattice.push(frame);
  }
}

// =============================================================================
// ModelConstructor
// =============================================================================

export class ModelConstructor {
  private config: Required<ConstructorConfig>;
  private state: ConstructorState = 'idle';
  private currentModel: AcceleratorModel | null = null;
  private frameStack: SequenceFrame[] = [];

  constructor(config: ConstructorConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.autoStart) {
      this.startNewModel();
    }
  }

  getState(): ConstructorState {
    return this.state;
  }

  /** Number of open frames, root included */
  getDepth(): number {
    return this.frameStack.length;
  }

  /**
   * The frame currently receiving appends
   */
  getCurrentFrame(): SequenceFrame {
    return this.top(this.requireModel('getCurrentFrame'));
  }

  /**
   * Discard any model in progress and begin a new one with a fresh root
   */
  startNewModel(): void {
    this.transition('building', 'startNewModel');

    if (this.currentModel) {
      this.log(`Discarding model with ${this.currentModel.elements.size()} elements`);
    }
    this.frameStack = [];

    const root = new SequenceFrame(this.config.rootName, this.config.rootOrigin);
    const model = new AcceleratorModel(root);
    model.elements.add(root);

    this.currentModel = model;
    this.frameStack.push(root);
    this.log(`Started model ${root.getName()}`);
  }

  /**
   * Register `frame` and make it the target of subsequent appends
   */
  openFrame(frame: SequenceFrame): void {
    const model = this.requireModel('openFrame');
    invariant(
      !this.frameStack.includes(frame),
      'INVALID_ARGUMENT',
      `Frame ${frame.getName()} is already open`,
      { frame: frame.getName() }
    );

    model.elements.add(frame);
    this.frameStack.push(frame);
    this.log(`Opened frame ${frame.getName()} (depth ${this.frameStack.length})`);
  }

  /**
   * Close the innermost open frame and append it to its parent
   */
  closeFrame(): void {
    this.requireModel('closeFrame');
    invariant(
      this.frameStack.length > 1,
      'FRAME_STACK_UNDERFLOW',
      'closeFrame called with no frame open above the root',
      { depth: this.frameStack.length }
    );

    const closed = this.frameStack.pop();
    invariant(closed, 'FRAME_STACK_UNDERFLOW', 'Frame stack is empty');
    this.top(this.currentModelOrThrow()).appendFrame(closed);
    this.log(`Closed frame ${closed.getName()} (depth ${this.frameStack.length})`);
  }

  /**
   * Append an anonymous drift of `length`
   */
  appendDrift(length: number): ComponentFrame<Drift> {
    this.requireModel('appendDrift');
    const frame = new ComponentFrame(new Drift(this.config.driftName, length));
    this.appendComponentFrame(frame);
    return frame;
  }

  /**
   * Append one component occurrence. Returns its lattice index.
   */
  appendComponentFrame(frame: ComponentFrame): number {
    const model = this.requireModel('appendComponentFrame');
    const parent = this.top(model);
    this.assertAppendable(parent, frame);

    const index = model.lattice.push(frame);
    model.elements.add(frame);
    const component = frame.getComponent();
    if (component) {
      model.elements.add(component);
    }
    parent.appendFrame(frame);
    this.log(`Appended ${frame.getName()} at index ${index}`);
    return index;
  }

  /**
   * Splice in a pre-built frame. Everything inside it is registered and its
   * occurrences join the lattice in traversal order; the frame itself then
   * becomes a single child of the current frame. Nothing is registered or
   * placed unless the whole splice can go through.
   */
  appendFrame(frame: LatticeFrame): void {
    const model = this.requireModel('appendFrame');
    const parent = this.top(model);
    this.assertAppendable(parent, frame);
    this.assertSpliceable(model, parent, frame);

    const before = model.lattice.size();
    traverse(frame, new ElementExtractor(model.elements, model.lattice));
    parent.appendFrame(frame);
    this.log(`Appended frame ${frame.getName()} with ${model.lattice.size() - before} components`);
  }

  /**
   * Register an element that is not (yet) placed in the beamline
   */
  addModelElement(element: ModelElement): void {
    this.requireModel('addModelElement').elements.add(element);
  }

  /**
   * Close the root, consolidate it and hand over the model. The constructor
   * is left without a model until the next startNewModel.
   */
  finish(): AcceleratorModel {
    const model = this.requireModel('finish');
    invariant(
      this.frameStack.length === 1,
      'UNBALANCED_FRAMES',
      `finish called with ${this.frameStack.length - 1} frame(s) still open: ${this.openFrameNames().join(', ')}`,
      { open: this.openFrameNames() }
    );

    this.transition('finalized', 'finish');
    const root = this.frameStack.pop();
    invariant(root && this.getDepth() === 0, 'UNBALANCED_FRAMES', 'Frame stack not empty after closing root');

    root.consolidate();
    this.currentModel = null;
    this.log(`Finished model: ${model.lattice.size()} components, ${model.elements.size()} elements`);
    return model;
  }

  /**
   * Write a summary of the model in progress to `sink`
   */
  reportStatistics(sink: StatisticsSink): ModelStatistics {
    return reportStatistics(this.requireModel('reportStatistics'), sink);
  }

  /**
   * Update configuration. Root settings apply from the next model on.
   */
  configure(config: Partial<ConstructorConfig>): void {
    this.config = { ...this.config, ...config };
  }

  // ==================== Internals ====================

  private transition(to: ConstructorState, operation: string): void {
    if (!STATE_TRANSITIONS[this.state].includes(to)) {
      throw new ConstructionError(
        `${operation}: invalid transition ${this.state} -> ${to}`,
        'INVALID_TRANSITION',
        { state: this.state, operation }
      );
    }
    this.state = to;
  }

  private requireModel(operation: string): AcceleratorModel {
    if (this.state !== 'building') {
      throw new ConstructionError(
        `${operation} requires a model in progress (state: ${this.state})`,
        'NO_MODEL_IN_PROGRESS',
        { state: this.state, operation }
      );
    }
    return this.currentModelOrThrow();
  }

  private currentModelOrThrow(): AcceleratorModel {
    invariant(this.currentModel, 'NO_MODEL_IN_PROGRESS', 'No model in progress');
    return this.currentModel;
  }

  private top(model: AcceleratorModel): SequenceFrame {
    const frame = this.frameStack[this.frameStack.length - 1];
    invariant(frame, 'FRAME_STACK_UNDERFLOW', `No open frame in model ${model.getGlobalFrame().getName()}`);
    return frame;
  }

  private assertAppendable(parent: SequenceFrame, frame: LatticeFrame): void {
    invariant(
      !parent.isConsolidated(),
      'FRAME_CONSOLIDATED',
      `Cannot append to consolidated frame ${parent.getName()}`,
      { frame: parent.getName() }
    );
    invariant(
      frame.kind === 'component' || !this.frameStack.includes(frame),
      'INVALID_ARGUMENT',
      `Frame ${frame.getName()} is open and cannot be appended`,
      { frame: frame.getName() }
    );
  }

  private assertSpliceable(model: AcceleratorModel, parent: SequenceFrame, frame: LatticeFrame): void {
    invariant(
      !parent.isWithin(frame),
      'INVALID_ARGUMENT',
      `Frame ${frame.getName()} encloses ${parent.getName()} and cannot be nested inside it`,
      { frame: frame.getName(), parent: parent.getName() }
    );

    const seen = new Set<ComponentFrame>();
    for (const occurrence of collectComponentFrames(frame)) {
      invariant(
        !seen.has(occurrence) && !model.lattice.contains(occurrence),
        'OCCURRENCE_ALREADY_PLACED',
        `${occurrence.getName()} is already placed in the lattice`,
        { name: occurrence.getName(), frame: frame.getName() }
      );
      seen.add(occurrence);
    }
  }

  private openFrameNames(): string[] {
    return this.frameStack.slice(1).map((frame) => frame.getName());
  }

  private log(message: string): void {
    if (this.config.trace) {
      console.log(`[ModelConstructor] ${message}`);
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createModelConstructor(config?: ConstructorConfig): ModelConstructor {
  return new ModelConstructor(config);
}
