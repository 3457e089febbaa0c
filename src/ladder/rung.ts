import { LadderError } from '../errors';
import type {
  BranchContext,
  BranchId,
  InstructionElement,
  InstructionRef,
  RungElement,
  RungElementDraft
} from '../types';
import {
  annotateSequence,
  findBranchEnd,
  findRailEnd,
  hasRail,
  isSelfContainedRun,
  maxBranchDepthOf,
  railAtGap,
  toDrafts
} from './sequence';
import { formatRungText, parseRungElements } from './text/rungText';

export interface RungInit {
  text?: string;
  comment?: string;
}

export interface RungState {
  readonly elements: readonly RungElement[];
  readonly comment: string | undefined;
}

function normalizeComment(comment: string | undefined): string | undefined {
  return comment === undefined || comment.trim() === '' ? undefined : comment;
}

function describeRail(railId: BranchId | undefined): string {
  return railId === undefined ? 'the main rail' : `rail ${railId}`;
}

/**
 * One rung's ordered element sequence. Every mutation builds a candidate sequence, re-derives
 * positions and branch annotations from it, and only then replaces the current one.
 */
export class Rung {
  private elements: readonly RungElement[];
  private commentText: string | undefined;
  private depth: number;

  constructor(private readonly allocateBranchId: () => BranchId, init: RungInit = {}) {
    const drafts = init.text ? parseRungElements(init.text, allocateBranchId) : [];
    this.elements = annotateSequence(drafts);
    this.depth = maxBranchDepthOf(this.elements);
    this.commentText = normalizeComment(init.comment);
  }

  public get length(): number {
    return this.elements.length;
  }

  public get comment(): string | undefined {
    return this.commentText;
  }

  public get maxBranchDepth(): number {
    return this.depth;
  }

  public getElements(): readonly RungElement[] {
    return this.elements;
  }

  public getElement(position: number): RungElement {
    if (!Number.isInteger(position) || position < 0 || position >= this.elements.length) {
      throw new LadderError('PositionOutOfRange', `Position ${position} is outside 0..${this.elements.length - 1}.`, {
        position,
        length: this.elements.length
      });
    }
    return this.elements[position];
  }

  public commentLineCount(): number {
    if (this.commentText === undefined) {
      return 0;
    }
    const lines = this.commentText.split(/\r\n|\r|\n/);
    if (lines[lines.length - 1] === '') {
      lines.pop();
    }
    return lines.length;
  }

  public setComment(comment: string | undefined): void {
    this.commentText = normalizeComment(comment);
  }

  public insertInstruction(position: number, context: BranchContext, instruction: InstructionRef): InstructionElement {
    const drafts = this.insertInto(this.elements, position, context, instruction);
    this.commit(drafts);
    return this.instructionAt(position);
  }

  /** Removes the instruction at `from` and inserts it at `to`, counted after the removal. */
  public moveInstruction(from: number, to: number, context: BranchContext): InstructionElement {
    const moving = this.instructionAt(from);
    const remaining = annotateSequence(toDrafts(this.elements.filter((_, index) => index !== from)));
    const drafts = this.insertInto(remaining, to, context, moving.instruction);
    this.commit(drafts);
    return this.instructionAt(to);
  }

  /** Swaps the instruction at `position` for another, keeping its place and rail. */
  public replaceInstruction(position: number, instruction: InstructionRef): InstructionElement {
    this.instructionAt(position);
    const drafts = toDrafts(this.elements);
    drafts[position] = { kind: 'instruction', instruction };
    this.commit(drafts);
    return this.instructionAt(position);
  }

  public removeInstruction(position: number): InstructionElement {
    const removed = this.instructionAt(position);
    const drafts = toDrafts(this.elements);
    drafts.splice(position, 1);
    this.commit(drafts);
    return removed;
  }

  /**
   * Wraps the elements in `[start, end)` into a new branch and opens an empty parallel rail
   * below them. Returns the new branch id.
   */
  public insertBranch(start: number, end: number, context: BranchContext): BranchId {
    this.assertGap(this.elements, start);
    this.assertGap(this.elements, end);
    if (start > end) {
      throw new LadderError('InvalidInsertionPoint', `Branch start ${start} follows its end ${end}.`, { start, end });
    }
    this.assertRail(this.elements, start, context);
    this.assertRail(this.elements, end, context);
    if (!isSelfContainedRun(this.elements, start, end)) {
      throw new LadderError('InvalidInsertionPoint', `Positions ${start}..${end} cut across an existing branch.`, {
        start,
        end
      });
    }

    const branchId = this.allocateBranchId();
    const railId = this.allocateBranchId();
    const drafts = toDrafts(this.elements);
    const wrapped: RungElementDraft[] = [
      { kind: 'branchStart', branchId },
      ...drafts.slice(start, end),
      { kind: 'branchNext', branchId: railId },
      { kind: 'branchEnd', branchId }
    ];
    this.commit([...drafts.slice(0, start), ...wrapped, ...drafts.slice(end)]);
    return branchId;
  }

  /** Adds an empty sibling rail directly below the rail opened by the marker at `atPosition`. */
  public insertBranchLevel(atPosition: number): BranchId {
    const marker = this.getElement(atPosition);
    if (marker.kind !== 'branchStart' && marker.kind !== 'branchNext') {
      throw new LadderError('InvalidElementKind', `Position ${atPosition} is not a branch start or rail marker.`, {
        position: atPosition,
        kind: marker.kind
      });
    }
    const insertAt = findRailEnd(this.elements, atPosition);
    const railId = this.allocateBranchId();
    const drafts = toDrafts(this.elements);
    drafts.splice(insertAt, 0, { kind: 'branchNext', branchId: railId });
    this.commit(drafts);
    return railId;
  }

  /**
   * Moves a whole branch, rails and contents included, to the gap `to` on the rail named by
   * `context`. `to` is counted in the sequence as it is before the move and may not fall inside
   * the branch itself.
   */
  public moveBranch(branchId: BranchId, to: number, context: BranchContext): BranchId {
    const start = this.elements.findIndex(element => element.kind === 'branchStart' && element.branchId === branchId);
    if (start < 0) {
      throw new LadderError('BranchNotFound', `Branch ${branchId} does not exist in this rung.`, { branchId });
    }
    const end = findBranchEnd(this.elements, start) + 1;
    this.assertGap(this.elements, to);
    if (to > start && to < end) {
      throw new LadderError('InvalidInsertionPoint', `Position ${to} lies inside branch ${branchId}.`, {
        branchId,
        position: to
      });
    }

    const drafts = toDrafts(this.elements);
    const moving = drafts.splice(start, end - start);
    const remaining = annotateSequence(drafts);
    const target = to >= end ? to - moving.length : to;
    this.assertRail(remaining, target, context);
    drafts.splice(target, 0, ...moving);
    this.commit(drafts);
    return branchId;
  }

  /**
   * Removes a whole branch when given a branch id, or a single sibling rail when given a rail id.
   * Nested content goes with it.
   */
  public removeBranch(branchId: BranchId): RungElement[] {
    const index = this.elements.findIndex(
      element => (element.kind === 'branchStart' || element.kind === 'branchNext') && element.branchId === branchId
    );
    if (index < 0) {
      throw new LadderError('BranchNotFound', `Branch ${branchId} does not exist in this rung.`, { branchId });
    }
    const end = this.elements[index].kind === 'branchStart'
      ? findBranchEnd(this.elements, index) + 1
      : findRailEnd(this.elements, index);
    const removed = this.elements.slice(index, end);
    const drafts = toDrafts(this.elements);
    drafts.splice(index, end - index);
    this.commit(drafts);
    return removed;
  }

  public snapshot(): RungState {
    return { elements: this.elements, comment: this.commentText };
  }

  public restore(state: RungState): void {
    this.elements = state.elements;
    this.depth = maxBranchDepthOf(state.elements);
    this.commentText = state.comment;
  }

  public toText(): string {
    return formatRungText(this.elements);
  }

  private instructionAt(position: number): InstructionElement {
    const element = this.getElement(position);
    if (element.kind !== 'instruction') {
      throw new LadderError('InvalidElementKind', `Position ${position} holds a ${element.kind} marker, not an instruction.`, {
        position,
        kind: element.kind
      });
    }
    return element;
  }

  private insertInto(
    elements: readonly RungElement[],
    position: number,
    context: BranchContext,
    instruction: InstructionRef
  ): RungElementDraft[] {
    this.assertGap(elements, position);
    this.assertRail(elements, position, context);
    const drafts = toDrafts(elements);
    drafts.splice(position, 0, { kind: 'instruction', instruction });
    return drafts;
  }

  private assertGap(elements: readonly RungElement[], position: number): void {
    if (!Number.isInteger(position) || position < 0 || position > elements.length) {
      throw new LadderError('PositionOutOfRange', `Position ${position} is outside 0..${elements.length}.`, {
        position,
        length: elements.length
      });
    }
  }

  private assertRail(elements: readonly RungElement[], position: number, context: BranchContext): void {
    if (context.branchId !== undefined && !hasRail(elements, context.branchId)) {
      throw new LadderError('BranchNotFound', `Branch ${context.branchId} does not exist in this rung.`, {
        branchId: context.branchId
      });
    }
    const rail = railAtGap(elements, position);
    if (rail !== context.branchId) {
      throw new LadderError(
        'InvalidInsertionPoint',
        `Position ${position} is on ${describeRail(rail)}, not ${describeRail(context.branchId)}.`,
        { position, expected: context.branchId ?? null, actual: rail ?? null }
      );
    }
  }

  private commit(drafts: readonly RungElementDraft[]): void {
    const next = annotateSequence(drafts);
    this.elements = next;
    this.depth = maxBranchDepthOf(next);
  }
}
