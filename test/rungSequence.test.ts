import { describe, expect, it } from 'vitest';
import { LadderError, isLadderError } from '../src/errors';
import { createInstruction } from '../src/ladder/instructions';
import { BranchIdAllocator } from '../src/ladder/routine';
import { Rung } from '../src/ladder/rung';
import {
  annotateSequence,
  findBranchEnd,
  findRailEnd,
  isSelfContainedRun,
  maxBranchDepthOf,
  railAtGap
} from '../src/ladder/sequence';
import { parseRungElements } from '../src/ladder/text/rungText';
import type { RungElementDraft } from '../src/types';

function createRung(text: string, comment?: string): Rung {
  const ids = new BranchIdAllocator();
  return new Rung(() => ids.allocate(), { text, comment });
}

function errorCode(action: () => unknown): string | undefined {
  try {
    action();
  } catch (error) {
    return isLadderError(error) ? error.code : 'unexpected';
  }
  return undefined;
}

const xio = createInstruction('XIO', ['C']);

describe('annotateSequence', () => {
  const ids = new BranchIdAllocator();
  const elements = annotateSequence(parseRungElements('XIC(A)[XIC(B),XIO(C)]OTE(D);', () => ids.allocate()));

  it('derives positions, levels, rails and root branches', () => {
    expect(
      elements.map(element => ({
        kind: element.kind,
        position: element.position,
        branchLevel: element.branchLevel,
        railId: element.railId,
        rootBranchId: element.rootBranchId
      }))
    ).toEqual([
      { kind: 'instruction', position: 0, branchLevel: 0, railId: undefined, rootBranchId: undefined },
      { kind: 'branchStart', position: 1, branchLevel: 0, railId: undefined, rootBranchId: 0 },
      { kind: 'instruction', position: 2, branchLevel: 1, railId: 0, rootBranchId: 0 },
      { kind: 'branchNext', position: 3, branchLevel: 1, railId: 1, rootBranchId: 0 },
      { kind: 'instruction', position: 4, branchLevel: 1, railId: 1, rootBranchId: 0 },
      { kind: 'branchEnd', position: 5, branchLevel: 0, railId: undefined, rootBranchId: 0 },
      { kind: 'instruction', position: 6, branchLevel: 0, railId: undefined, rootBranchId: undefined }
    ]);
    expect(maxBranchDepthOf(elements)).toBe(1);
  });

  it('reports the rail an insertion gap sits on', () => {
    expect([0, 1, 2, 3, 4, 5, 6, 7].map(gap => railAtGap(elements, gap))).toEqual([
      undefined,
      undefined,
      0,
      0,
      1,
      1,
      undefined,
      undefined
    ]);
  });

  it('finds branch and rail ends', () => {
    expect(findBranchEnd(elements, 1)).toBe(5);
    expect(findRailEnd(elements, 1)).toBe(3);
    expect(findRailEnd(elements, 3)).toBe(5);
  });

  it('recognises runs that hold whole branches only', () => {
    expect(isSelfContainedRun(elements, 1, 6)).toBe(true);
    expect(isSelfContainedRun(elements, 2, 4)).toBe(false);
    expect(isSelfContainedRun(elements, 0, 2)).toBe(false);
  });

  it('rejects unbalanced marker sequences', () => {
    const cases: RungElementDraft[][] = [
      [{ kind: 'branchNext', branchId: 0 }],
      [{ kind: 'branchStart', branchId: 0 }],
      [{ kind: 'branchEnd', branchId: 0 }],
      [
        { kind: 'branchStart', branchId: 0 },
        { kind: 'branchEnd', branchId: 1 }
      ],
      [
        { kind: 'branchStart', branchId: 0 },
        { kind: 'branchNext', branchId: 0 },
        { kind: 'branchEnd', branchId: 0 }
      ]
    ];
    for (const drafts of cases) {
      expect(errorCode(() => annotateSequence(drafts))).toBe('UnbalancedBranch');
    }
  });
});

describe('Rung', () => {
  it('inserts an instruction and shifts later positions', () => {
    const rung = createRung('XIC(A)OTE(B);');
    const inserted = rung.insertInstruction(1, {}, xio);

    expect(inserted.position).toBe(1);
    expect(rung.toText()).toBe('XIC(A)XIO(C)OTE(B);');
    expect(rung.getElement(2).position).toBe(2);
  });

  it('inserts onto a branch rail', () => {
    const rung = createRung('XIC(A)[XIC(B),]OTE(D);');
    const inserted = rung.insertInstruction(4, { branchId: 1 }, xio);

    expect(rung.toText()).toBe('XIC(A)[XIC(B),XIO(C)]OTE(D);');
    expect(inserted).toMatchObject({ position: 4, branchLevel: 1, railId: 1, branchId: 1, rootBranchId: 0 });
  });

  it('leaves the rung untouched when an insertion is rejected', () => {
    const rung = createRung('XIC(A)[XIC(B),]OTE(D);');

    expect(errorCode(() => rung.insertInstruction(4, {}, xio))).toBe('InvalidInsertionPoint');
    expect(errorCode(() => rung.insertInstruction(2, { branchId: 7 }, xio))).toBe('BranchNotFound');
    expect(errorCode(() => rung.insertInstruction(9, {}, xio))).toBe('PositionOutOfRange');
    expect(errorCode(() => rung.insertInstruction(1.5, {}, xio))).toBe('PositionOutOfRange');
    expect(rung.toText()).toBe('XIC(A)[XIC(B),]OTE(D);');
  });

  it('wraps a run into a new branch with an empty rail', () => {
    const rung = createRung('XIC(A)OTE(B);');
    const branchId = rung.insertBranch(0, 1, {});

    expect(branchId).toBe(0);
    expect(rung.toText()).toBe('[XIC(A),]OTE(B);');
    expect(rung.getElement(2)).toMatchObject({ kind: 'branchNext', branchId: 1 });
    expect(rung.maxBranchDepth).toBe(1);
  });

  it('wraps an existing branch into an outer one', () => {
    const rung = createRung('XIC(A)[XIC(B),XIO(C)]OTE(D);');
    rung.insertBranch(1, 6, {});

    expect(rung.toText()).toBe('XIC(A)[[XIC(B),XIO(C)],]OTE(D);');
    expect(rung.maxBranchDepth).toBe(2);
  });

  it('rejects branch ranges that are reversed or span rails', () => {
    const rung = createRung('XIC(A)[XIC(B),XIO(C)]OTE(D);');

    expect(errorCode(() => rung.insertBranch(2, 1, { branchId: 0 }))).toBe('InvalidInsertionPoint');
    expect(errorCode(() => rung.insertBranch(0, 2, {}))).toBe('InvalidInsertionPoint');
    expect(errorCode(() => rung.insertBranch(0, 9, {}))).toBe('PositionOutOfRange');
  });

  it('adds a sibling rail below the rail opened at a marker', () => {
    const rung = createRung('XIC(A)[XIC(B),XIO(C)]OTE(D);');

    expect(rung.insertBranchLevel(1)).toBe(2);
    expect(rung.toText()).toBe('XIC(A)[XIC(B),,XIO(C)]OTE(D);');

    const other = createRung('XIC(A)[XIC(B),XIO(C)]OTE(D);');
    other.insertBranchLevel(3);
    expect(other.toText()).toBe('XIC(A)[XIC(B),XIO(C),]OTE(D);');
  });

  it('only adds rails at branch start or rail markers', () => {
    const rung = createRung('XIC(A)[XIC(B),XIO(C)]OTE(D);');

    expect(errorCode(() => rung.insertBranchLevel(0))).toBe('InvalidElementKind');
    expect(errorCode(() => rung.insertBranchLevel(5))).toBe('InvalidElementKind');
    expect(errorCode(() => rung.insertBranchLevel(7))).toBe('PositionOutOfRange');
  });

  it('removes a whole branch or a single rail', () => {
    const whole = createRung('XIC(A)[XIC(B),XIO(C)]OTE(D);');
    expect(whole.removeBranch(0)).toHaveLength(5);
    expect(whole.toText()).toBe('XIC(A)OTE(D);');

    const rail = createRung('XIC(A)[XIC(B),XIO(C)]OTE(D);');
    expect(rail.removeBranch(1).map(element => element.kind)).toEqual(['branchNext', 'instruction']);
    expect(rail.toText()).toBe('XIC(A)[XIC(B)]OTE(D);');

    expect(errorCode(() => rail.removeBranch(9))).toBe('BranchNotFound');
  });

  it('moves an instruction with the target counted after removal', () => {
    const rung = createRung('XIC(A)XIO(B)OTE(C);');
    const moved = rung.moveInstruction(0, 1, {});

    expect(moved.position).toBe(1);
    expect(rung.toText()).toBe('XIO(B)XIC(A)OTE(C);');
  });

  it('replaces an instruction in place', () => {
    const rung = createRung('XIC(A)OTE(B);');
    const replaced = rung.replaceInstruction(0, xio);

    expect(replaced).toMatchObject({ position: 0, branchLevel: 0, railId: undefined });
    expect(rung.toText()).toBe('XIO(C)OTE(B);');

    const branched = createRung('[XIC(A)]');
    expect(errorCode(() => branched.replaceInstruction(0, xio))).toBe('InvalidElementKind');
    expect(errorCode(() => branched.replaceInstruction(5, xio))).toBe('PositionOutOfRange');
    expect(branched.toText()).toBe('[XIC(A)];');
  });

  it('moves a whole branch with the target counted before the move', () => {
    const front = createRung('XIC(A)[XIC(B),XIO(C)]OTE(D);');
    expect(front.moveBranch(0, 0, {})).toBe(0);
    expect(front.toText()).toBe('[XIC(B),XIO(C)]XIC(A)OTE(D);');

    const back = createRung('XIC(A)[XIC(B),XIO(C)]OTE(D);');
    back.moveBranch(0, 7, {});
    expect(back.toText()).toBe('XIC(A)OTE(D)[XIC(B),XIO(C)];');
    expect(back.getElement(2)).toMatchObject({ kind: 'branchStart', branchId: 0, position: 2 });
  });

  it('moves a branch onto another branch rail', () => {
    const rung = createRung('XIC(A)[XIC(B),]OTE(D)[XIO(E),XIO(F)];');
    rung.moveBranch(2, 4, { branchId: 1 });

    expect(rung.toText()).toBe('XIC(A)[XIC(B),[XIO(E),XIO(F)]]OTE(D);');
    expect(rung.maxBranchDepth).toBe(2);
  });

  it('rejects branch moves into the branch itself or of unknown branches', () => {
    const rung = createRung('XIC(A)[XIC(B),XIO(C)]OTE(D);');

    expect(errorCode(() => rung.moveBranch(0, 3, {}))).toBe('InvalidInsertionPoint');
    expect(errorCode(() => rung.moveBranch(9, 0, {}))).toBe('BranchNotFound');
    expect(errorCode(() => rung.moveBranch(1, 0, {}))).toBe('BranchNotFound');
    expect(errorCode(() => rung.moveBranch(0, 8, {}))).toBe('PositionOutOfRange');
    expect(rung.toText()).toBe('XIC(A)[XIC(B),XIO(C)]OTE(D);');
  });

  it('refuses to remove markers as instructions', () => {
    const rung = createRung('[XIC(A)]');

    expect(errorCode(() => rung.removeInstruction(0))).toBe('InvalidElementKind');
    expect(rung.removeInstruction(1).instruction.text).toBe('XIC(A)');
    expect(rung.toText()).toBe('[];');
  });

  it('counts comment lines and clears blank comments', () => {
    const rung = createRung('XIC(A)OTE(B);', 'first\nsecond\n');

    expect(rung.commentLineCount()).toBe(2);
    rung.setComment('   ');
    expect(rung.comment).toBeUndefined();
    expect(rung.commentLineCount()).toBe(0);
  });

  it('restores a snapshot', () => {
    const rung = createRung('XIC(A)OTE(B);', 'note');
    const state = rung.snapshot();
    rung.insertBranch(0, 2, {});
    rung.setComment(undefined);

    rung.restore(state);
    expect(rung.toText()).toBe('XIC(A)OTE(B);');
    expect(rung.comment).toBe('note');
    expect(rung.maxBranchDepth).toBe(0);
  });

  it('raises LadderError instances with recoverability flags', () => {
    expect(new LadderError('InvalidInsertionPoint', 'x').recoverable).toBe(true);
    expect(new LadderError('NoRungAtCoordinate', 'x').recoverable).toBe(true);
    expect(new LadderError('BranchNotFound', 'x').recoverable).toBe(false);
  });
});
