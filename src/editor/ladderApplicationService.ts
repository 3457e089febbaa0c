import { LadderError } from '../errors';
import { parseInstructionText } from '../ladder/text/rungText';
import { L5xRoutineService } from '../services/l5xRoutineService';
import type { BranchId, LayoutResult, RoutineExtent, RoutineSnapshot, RoutineSource, WireSegment } from '../types';
import type { LocateResult } from './editorTypes';
import type { LadderEditor } from './ladderEditor';

export interface InstructionPlacement {
  instruction: string;
  rungNumber?: number;
  position?: number;
  branchId?: BranchId;
  x?: number;
  y?: number;
}

export interface BranchRange {
  rungNumber: number;
  start: number;
  end: number;
  branchId?: BranchId;
}

export interface ElementLocation {
  rungNumber: number;
  position: number;
}

export interface InstructionReplacement {
  instruction: string;
  rungNumber: number;
  position: number;
}

export interface BranchMove {
  rungNumber: number;
  branchId: BranchId;
  position: number;
  // Rail the branch lands on; omitted for the main rail.
  targetBranchId?: BranchId;
}

export interface BranchLocation {
  rungNumber: number;
  branchId: BranchId;
}

export interface CommentUpdate {
  rungNumber: number;
  comment?: string;
}

export interface InsertionQuery {
  x: number;
  rungNumber: number;
  branchLevel: number;
  branchId?: BranchId;
}

export interface RungAddition {
  text?: string;
  comment?: string;
  index?: number;
}

export interface RungEditResponse {
  rungNumber: number;
  text: string;
}

export interface RoutineLoadResponse {
  loaded: true;
  routine: RoutineSnapshot;
}

export interface LayoutResponse {
  layouts: LayoutResult[];
  wires: WireSegment[];
  extent: RoutineExtent;
}

/** Plain-object facade over a LadderEditor for tool and HTTP hosts. */
export class LadderApplicationService {
  constructor(
    private readonly editor: LadderEditor,
    private readonly l5x: L5xRoutineService = new L5xRoutineService()
  ) {}

  public loadRoutine(source: RoutineSource): RoutineLoadResponse {
    return { loaded: true, routine: this.editor.load(source) };
  }

  public loadL5x(xml: string, routineName?: string): RoutineLoadResponse {
    return this.loadRoutine(this.l5x.parseRoutine(xml, routineName));
  }

  public exportL5x(programName?: string): { xml: string } {
    return { xml: this.l5x.buildRoutine(this.editor.snapshot(), { programName }) };
  }

  public getRoutine(): RoutineSnapshot {
    return this.editor.snapshot();
  }

  public getLayout(rungNumber?: number): LayoutResponse {
    const layouts = rungNumber === undefined ? [...this.editor.getLayouts()] : [this.editor.getLayout(rungNumber)];
    return {
      layouts,
      wires: layouts.flatMap(layout => this.editor.getWires(layout.rungNumber)),
      extent: this.editor.getExtent()
    };
  }

  public getExtent(): RoutineExtent {
    return this.editor.getExtent();
  }

  public insertInstruction(placement: InstructionPlacement): RungEditResponse & { position: number } {
    const instruction = parseInstructionText(placement.instruction);
    if (placement.x !== undefined && placement.y !== undefined) {
      const placed = this.editor.insertInstructionAtPoint(placement.x, placement.y, instruction);
      return { ...this.rungText(placed.rungNumber), position: placed.element.position };
    }
    if (placement.rungNumber === undefined || placement.position === undefined) {
      throw new LadderError('InvalidInsertionPoint', 'Give either rungNumber and position, or x and y.');
    }
    const element = this.editor.insertInstruction(
      placement.rungNumber,
      placement.position,
      { branchId: placement.branchId },
      instruction
    );
    return { ...this.rungText(placement.rungNumber), position: element.position };
  }

  public replaceInstruction(replacement: InstructionReplacement): RungEditResponse & { position: number } {
    const element = this.editor.replaceInstruction(
      replacement.rungNumber,
      replacement.position,
      parseInstructionText(replacement.instruction)
    );
    return { ...this.rungText(replacement.rungNumber), position: element.position };
  }

  public insertBranch(range: BranchRange): RungEditResponse & { branchId: BranchId } {
    const branchId = this.editor.insertBranch(range.rungNumber, range.start, range.end, { branchId: range.branchId });
    return { ...this.rungText(range.rungNumber), branchId };
  }

  public insertBranchLevel(location: ElementLocation): RungEditResponse & { branchId: BranchId } {
    const branchId = this.editor.insertBranchLevel(location.rungNumber, location.position);
    return { ...this.rungText(location.rungNumber), branchId };
  }

  public moveBranch(move: BranchMove): RungEditResponse & { branchId: BranchId } {
    const branchId = this.editor.moveBranch(move.rungNumber, move.branchId, move.position, {
      branchId: move.targetBranchId
    });
    return { ...this.rungText(move.rungNumber), branchId };
  }

  public removeBranch(location: BranchLocation): RungEditResponse & { removed: number } {
    const removed = this.editor.removeBranch(location.rungNumber, location.branchId);
    return { ...this.rungText(location.rungNumber), removed: removed.length };
  }

  public removeElement(location: ElementLocation): RungEditResponse & { removed: number } {
    const removed = this.editor.deleteElement(location.rungNumber, location.position);
    return { ...this.rungText(location.rungNumber), removed: removed.length };
  }

  public setComment(update: CommentUpdate): { rungNumber: number; comment?: string; height: number } {
    this.editor.setComment(update.rungNumber, update.comment);
    const rung = this.editor.getRoutine().getRung(update.rungNumber);
    return {
      rungNumber: update.rungNumber,
      ...(rung.comment !== undefined ? { comment: rung.comment } : {}),
      height: this.editor.getLayout(update.rungNumber).height
    };
  }

  public addRung(addition: RungAddition): RungEditResponse {
    const rungNumber = this.editor.addRung({ text: addition.text, comment: addition.comment }, addition.index);
    return this.rungText(rungNumber);
  }

  public removeRung(rungNumber: number): { removed: number; rungCount: number } {
    this.editor.removeRung(rungNumber);
    return { removed: rungNumber, rungCount: this.editor.getRoutine().rungCount };
  }

  public locate(x: number, y: number): LocateResult {
    return this.editor.locate(x, y);
  }

  public findInsertionPosition(query: InsertionQuery): { position: number } {
    return {
      position: this.editor.findInsertionPosition(query.x, query.rungNumber, query.branchLevel, query.branchId)
    };
  }

  private rungText(rungNumber: number): RungEditResponse {
    return { rungNumber, text: this.editor.getRoutine().getRung(rungNumber).toText() };
  }
}
