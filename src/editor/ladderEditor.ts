import { DEFAULT_LAYOUT_CONFIG, type LayoutConfig } from '../config';
import { describeError, LadderError, isLadderError } from '../errors';
import { Routine } from '../ladder/routine';
import type { RungInit } from '../ladder/rung';
import { LayoutEngine } from '../layout/layoutEngine';
import { deriveWires } from '../layout/wires';
import type {
  BranchContext,
  BranchId,
  InstructionElement,
  InstructionRef,
  LayoutElement,
  LayoutResult,
  RoutineExtent,
  RoutineSnapshot,
  RoutineSource,
  RungElement,
  WireSegment
} from '../types';
import type {
  DisposableLike,
  EditorLogEvent,
  EditorLogListener,
  InsertionTarget,
  LayoutChangeListener,
  LocateResult,
  PlacedInstruction
} from './editorTypes';
import { InsertionLocator } from './insertionLocator';
import { MutationController, type DropTarget, type ElementAddress } from './mutationController';

export interface LadderEditorOptions {
  config?: LayoutConfig;
  logger?: EditorLogListener;
}

export class LadderEditor {
  public readonly config: LayoutConfig;
  private routine: Routine;
  private engine: LayoutEngine;
  private controller: MutationController;
  private locator: InsertionLocator;
  private readonly logListeners = new Set<EditorLogListener>();
  private readonly layoutListeners = new Set<LayoutChangeListener>();

  constructor(private readonly options: LadderEditorOptions = {}) {
    this.config = options.config ?? DEFAULT_LAYOUT_CONFIG;
    this.routine = new Routine();
    this.engine = new LayoutEngine(this.config);
    this.controller = new MutationController(this.routine, this.engine);
    this.locator = new InsertionLocator(this.controller);
  }

  public load(source: RoutineSource): RoutineSnapshot {
    let routine: Routine;
    try {
      routine = Routine.fromSource(source);
    } catch (error) {
      this.emitLog({ level: 'error', scope: 'routine', message: `Failed to load routine: ${describeError(error)}` });
      throw error;
    }
    this.routine = routine;
    this.engine = new LayoutEngine(this.config);
    this.controller = new MutationController(routine, this.engine);
    this.locator = new InsertionLocator(this.controller);
    const relaid = this.controller.relayoutAll();
    this.emitLog({
      level: 'info',
      scope: 'routine',
      message: `Loaded routine ${routine.name} with ${routine.rungCount} rung(s).`
    });
    this.emitLayout(relaid);
    return routine.toSnapshot();
  }

  public getRoutine(): Routine {
    return this.routine;
  }

  public snapshot(): RoutineSnapshot {
    return this.routine.toSnapshot();
  }

  public getLayouts(): readonly LayoutResult[] {
    return this.controller.getLayouts();
  }

  public getLayout(rungNumber: number): LayoutResult {
    return this.controller.getLayout(rungNumber);
  }

  public getWires(rungNumber: number): WireSegment[] {
    return deriveWires(this.controller.getLayout(rungNumber), this.config);
  }

  public getExtent(): RoutineExtent {
    return this.controller.extent();
  }

  public locate(x: number, y: number): LocateResult {
    return this.locator.locate(x, y);
  }

  public findInsertionPosition(x: number, rungNumber: number, branchLevel: number, branchId?: BranchId): number {
    return this.locator.findInsertionPosition(x, rungNumber, branchLevel, branchId);
  }

  public resolveInsertion(x: number, y: number): InsertionTarget {
    if (x < this.config.leftRailX) {
      throw new LadderError('InvalidInsertionPoint', `x ${x} is left of the power rail at ${this.config.leftRailX}.`, {
        x,
        y
      });
    }
    return this.locator.resolve(x, y);
  }

  public elementAt(x: number, y: number): LayoutElement | undefined {
    return this.locator.elementAt(x, y);
  }

  public insertInstruction(
    rungNumber: number,
    position: number,
    context: BranchContext,
    instruction: InstructionRef
  ): InstructionElement {
    return this.mutate('insertInstruction', { rungNumber, position, branchId: context.branchId }, () =>
      this.controller.insertElementAt(rungNumber, position, context, instruction)
    );
  }

  public insertInstructionAtPoint(x: number, y: number, instruction: InstructionRef): PlacedInstruction {
    return this.mutate('insertInstructionAtPoint', { x, y, instruction: instruction.text }, () => {
      const target = this.resolveInsertion(x, y);
      const element = this.controller.insertElementAt(
        target.rungNumber,
        target.position,
        { branchId: target.branchId },
        instruction
      );
      return { rungNumber: target.rungNumber, element };
    });
  }

  public replaceInstruction(rungNumber: number, position: number, instruction: InstructionRef): InstructionElement {
    return this.mutate('replaceInstruction', { rungNumber, position, instruction: instruction.text }, () =>
      this.controller.replaceElementAt(rungNumber, position, instruction)
    );
  }

  public insertBranch(rungNumber: number, start: number, end: number, context: BranchContext): BranchId {
    return this.mutate('insertBranch', { rungNumber, start, end, branchId: context.branchId }, () =>
      this.controller.insertBranch(rungNumber, start, end, context)
    );
  }

  public insertBranchLevel(rungNumber: number, atPosition: number): BranchId {
    return this.mutate('insertBranchLevel', { rungNumber, position: atPosition }, () =>
      this.controller.insertBranchLevel(rungNumber, atPosition)
    );
  }

  public moveBranch(rungNumber: number, branchId: BranchId, to: number, context: BranchContext): BranchId {
    return this.mutate('moveBranch', { rungNumber, branchId, position: to, railId: context.branchId }, () =>
      this.controller.moveBranch(rungNumber, branchId, to, context)
    );
  }

  public removeBranch(rungNumber: number, branchId: BranchId): RungElement[] {
    return this.mutate('removeBranch', { rungNumber, branchId }, () => this.controller.removeBranch(rungNumber, branchId));
  }

  public deleteElement(rungNumber: number, position: number): RungElement[] {
    return this.mutate('deleteElement', { rungNumber, position }, () => this.controller.deleteElementAt(rungNumber, position));
  }

  public moveElement(from: ElementAddress, to: DropTarget): InstructionElement {
    return this.mutate('moveElement', { from, to }, () => this.controller.moveElement(from, to));
  }

  public setComment(rungNumber: number, comment: string | undefined): void {
    this.mutate('setComment', { rungNumber }, () => this.controller.setComment(rungNumber, comment));
  }

  public addRung(init: RungInit = {}, index?: number): number {
    return this.mutate('addRung', { index: index ?? null }, () => this.controller.addRung(init, index));
  }

  public removeRung(rungNumber: number): void {
    this.mutate('removeRung', { rungNumber }, () => this.controller.removeRung(rungNumber));
  }

  public onLog(listener: EditorLogListener): DisposableLike {
    this.logListeners.add(listener);
    return {
      dispose: () => this.logListeners.delete(listener)
    };
  }

  public onLayout(listener: LayoutChangeListener): DisposableLike {
    this.layoutListeners.add(listener);
    return {
      dispose: () => this.layoutListeners.delete(listener)
    };
  }

  public dispose(): void {
    this.logListeners.clear();
    this.layoutListeners.clear();
  }

  private mutate<T>(action: string, details: Record<string, unknown>, operation: () => T): T {
    let result: T;
    try {
      result = operation();
    } catch (error) {
      const recoverable = isLadderError(error) && error.recoverable;
      this.emitLog({
        level: recoverable ? 'warn' : 'error',
        scope: 'editor',
        message: `${action} failed: ${describeError(error)}`,
        details: { ...details, code: isLadderError(error) ? error.code : 'internal' }
      });
      throw error;
    }
    const relaid = [...this.controller.relaidRungs];
    this.emitLog({
      level: 'info',
      scope: 'editor',
      message: `${action} re-laid out ${relaid.length} rung(s).`,
      details: { ...details, rungs: relaid }
    });
    this.emitLayout(relaid);
    return result;
  }

  private emitLayout(rungNumbers: number[]): void {
    const event = { rungNumbers, extent: this.controller.extent() };
    this.layoutListeners.forEach(listener => listener(event));
  }

  public log(event: EditorLogEvent): void {
    this.emitLog(event);
  }

  private emitLog(event: EditorLogEvent): void {
    this.options.logger?.(event);
    this.logListeners.forEach(listener => listener(event));
  }
}
