import { LadderError } from '../errors';
import type { Routine } from '../ladder/routine';
import type { Rung, RungInit } from '../ladder/rung';
import type { LayoutEngine } from '../layout/layoutEngine';
import type {
  Branch,
  BranchContext,
  BranchId,
  InstructionElement,
  InstructionRef,
  LayoutResult,
  RoutineExtent,
  RungElement
} from '../types';
import type { LayoutSource } from './editorTypes';

export interface ElementAddress {
  rungNumber: number;
  position: number;
}

export interface DropTarget extends ElementAddress {
  branchId?: BranchId;
}

/**
 * Applies edits to the routine and keeps the per-rung layout cache current. A mutated rung is
 * always re-laid out; following rungs are re-laid out only while y or height keep changing.
 */
export class MutationController implements LayoutSource {
  private layouts: LayoutResult[] = [];
  private lastRelaid: number[] = [];

  constructor(
    private readonly routine: Routine,
    private readonly engine: LayoutEngine
  ) {}

  public getLayouts(): readonly LayoutResult[] {
    return this.layouts;
  }

  public getBranches(rungNumber: number): readonly Branch[] {
    return this.engine.arena.forRung(rungNumber);
  }

  public getBranch(branchId: BranchId): Branch | undefined {
    return this.engine.arena.get(branchId);
  }

  public getLayout(rungNumber: number): LayoutResult {
    const layout = this.layouts[rungNumber];
    if (!layout) {
      throw new LadderError('PositionOutOfRange', `Rung ${rungNumber} is not laid out.`, { rungNumber });
    }
    return layout;
  }

  /** Rung numbers re-laid out by the most recent mutation, in processing order. */
  public get relaidRungs(): readonly number[] {
    return this.lastRelaid;
  }

  public relayoutAll(): number[] {
    this.engine.arena.clear();
    this.layouts = [];
    return this.relayout(this.range(0));
  }

  public insertElementAt(
    rungNumber: number,
    position: number,
    context: BranchContext,
    instruction: InstructionRef
  ): InstructionElement {
    return this.mutateRung(rungNumber, rung => rung.insertInstruction(position, context, instruction));
  }

  public replaceElementAt(rungNumber: number, position: number, instruction: InstructionRef): InstructionElement {
    return this.mutateRung(rungNumber, rung => rung.replaceInstruction(position, instruction));
  }

  /** Deletes an instruction, or the whole branch or rail a marker belongs to. */
  public deleteElementAt(rungNumber: number, position: number): RungElement[] {
    return this.mutateRung(rungNumber, rung => {
      const element = rung.getElement(position);
      switch (element.kind) {
        case 'instruction':
          return [rung.removeInstruction(position)];
        case 'branchStart':
        case 'branchEnd':
        case 'branchNext':
          return rung.removeBranch(element.branchId);
      }
    });
  }

  public insertBranch(rungNumber: number, start: number, end: number, context: BranchContext): BranchId {
    return this.mutateRung(rungNumber, rung => rung.insertBranch(start, end, context));
  }

  public insertBranchLevel(rungNumber: number, atPosition: number): BranchId {
    return this.mutateRung(rungNumber, rung => rung.insertBranchLevel(atPosition));
  }

  public removeBranch(rungNumber: number, branchId: BranchId): RungElement[] {
    return this.mutateRung(rungNumber, rung => rung.removeBranch(branchId));
  }

  public moveBranch(rungNumber: number, branchId: BranchId, to: number, context: BranchContext): BranchId {
    return this.mutateRung(rungNumber, rung => rung.moveBranch(branchId, to, context));
  }

  public setComment(rungNumber: number, comment: string | undefined): void {
    this.mutateRung(rungNumber, rung => rung.setComment(comment));
  }

  /**
   * Moves an instruction. `to.position` is counted in the target rung as it was before the move,
   * the way a drop location is read off the current layout.
   */
  public moveElement(from: ElementAddress, to: DropTarget): InstructionElement {
    const context: BranchContext = { branchId: to.branchId };
    if (from.rungNumber === to.rungNumber) {
      const target = to.position > from.position ? to.position - 1 : to.position;
      return this.mutateRung(from.rungNumber, rung => rung.moveInstruction(from.position, target, context));
    }

    const source = this.routine.getRung(from.rungNumber);
    const destination = this.routine.getRung(to.rungNumber);
    const sourceState = source.snapshot();
    const destinationState = destination.snapshot();
    try {
      const removed = source.removeInstruction(from.position);
      const moved = destination.insertInstruction(to.position, context, removed.instruction);
      this.relayout([from.rungNumber, to.rungNumber]);
      return moved;
    } catch (error) {
      source.restore(sourceState);
      destination.restore(destinationState);
      this.relayout([from.rungNumber, to.rungNumber]);
      throw error;
    }
  }

  public addRung(init: RungInit = {}, index = this.routine.rungCount): number {
    this.routine.addRung(init, index);
    this.engine.arena.renumberRungs(rungNumber => (rungNumber >= index ? rungNumber + 1 : rungNumber));
    this.relayout(this.range(index));
    return index;
  }

  public removeRung(rungNumber: number): void {
    this.routine.removeRung(rungNumber);
    this.engine.arena.renumberRungs(current => {
      if (current === rungNumber) {
        return undefined;
      }
      return current > rungNumber ? current - 1 : current;
    });
    this.layouts.splice(rungNumber, 1);
    this.relayout(this.range(rungNumber));
  }

  public extent(): RoutineExtent {
    const config = this.engine.layoutConfig;
    const last = this.layouts[this.layouts.length - 1];
    const widest = this.layouts.reduce((width, layout) => Math.max(width, layout.rightRailX), config.rightRailMinX);
    return {
      rungCount: this.layouts.length,
      width: widest + config.leftRailX,
      height: last ? last.y + last.height + config.rungGap : config.routineOriginY
    };
  }

  private mutateRung<T>(rungNumber: number, change: (rung: Rung) => T): T {
    const rung = this.routine.getRung(rungNumber);
    const before = rung.snapshot();
    const value = change(rung);
    try {
      this.relayout([rungNumber]);
    } catch (error) {
      rung.restore(before);
      throw error;
    }
    return value;
  }

  private relayout(dirty: readonly number[]): number[] {
    const count = this.routine.rungCount;
    this.layouts.length = Math.min(this.layouts.length, count);
    const pending = [...new Set(dirty)].filter(rungNumber => rungNumber < count).sort((a, b) => a - b);
    const relaid: number[] = [];

    for (let rungNumber = pending.shift(); rungNumber !== undefined; rungNumber = pending.shift()) {
      const previousY = this.routine.rungYPositions[rungNumber];
      const previousHeight = this.routine.rungHeights[rungNumber];
      const y = this.rungY(rungNumber);
      const layout = this.engine.layoutRung(this.routine.getRung(rungNumber), rungNumber, y);
      this.layouts[rungNumber] = layout;
      this.routine.setGeometry(rungNumber, y, layout.height);
      relaid.push(rungNumber);

      const next = rungNumber + 1;
      const moved = y !== previousY || layout.height !== previousHeight;
      if (moved && next < count && !pending.includes(next)) {
        const at = pending.findIndex(candidate => candidate > next);
        pending.splice(at < 0 ? pending.length : at, 0, next);
      }
    }

    this.lastRelaid = relaid;
    return relaid;
  }

  private rungY(rungNumber: number): number {
    const config = this.engine.layoutConfig;
    if (rungNumber === 0) {
      return config.routineOriginY;
    }
    return this.routine.rungYPositions[rungNumber - 1] + this.routine.rungHeights[rungNumber - 1] + config.rungGap;
  }

  private range(from: number): number[] {
    return Array.from({ length: Math.max(0, this.routine.rungCount - from) }, (_, offset) => from + offset);
  }
}
