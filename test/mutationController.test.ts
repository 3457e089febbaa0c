import { describe, expect, it } from 'vitest';
import { DEFAULT_LAYOUT_CONFIG } from '../src/config';
import { MutationController } from '../src/editor/mutationController';
import { isLadderError } from '../src/errors';
import { createInstruction } from '../src/ladder/instructions';
import { Routine } from '../src/ladder/routine';
import { LayoutEngine } from '../src/layout/layoutEngine';
import type { RungSource } from '../src/types';

function setup(rungs: RungSource[]): { routine: Routine; engine: LayoutEngine; controller: MutationController } {
  const routine = Routine.fromSource({ rungs });
  const engine = new LayoutEngine(DEFAULT_LAYOUT_CONFIG);
  const controller = new MutationController(routine, engine);
  controller.relayoutAll();
  return { routine, engine, controller };
}

const threeRungs: RungSource[] = [
  { text: 'XIC(A)OTE(B);' },
  { text: 'XIC(C)OTE(D);' },
  { text: 'XIC(E)OTE(F);' }
];

function texts(routine: Routine): string[] {
  return routine.getRungs().map(rung => rung.toText());
}

describe('MutationController', () => {
  it('lays out every rung with the gap between them', () => {
    const { routine, controller } = setup(threeRungs);

    expect(controller.relaidRungs).toEqual([0, 1, 2]);
    expect(controller.getLayouts().map(layout => layout.y)).toEqual([50, 150, 250]);
    expect(routine.rungYPositions).toEqual([50, 150, 250]);
    expect(routine.rungHeights).toEqual([80, 80, 80]);
    expect(controller.extent()).toEqual({ rungCount: 3, width: 640, height: 350 });
  });

  it('re-lays out only the edited rung when its height is unchanged', () => {
    const { controller } = setup(threeRungs);
    controller.insertElementAt(0, 1, {}, createInstruction('XIO', ['X']));

    expect(controller.relaidRungs).toEqual([0]);
    expect(controller.getLayout(0).elements.map(element => element.x)).toEqual([60, 120, 180]);
  });

  it('cascades to following rungs while geometry keeps changing', () => {
    const { routine, controller } = setup(threeRungs);
    const branchId = controller.insertBranch(0, 0, 1, {});

    expect(branchId).toBe(0);
    expect(texts(routine)[0]).toBe('[XIC(A),]OTE(B);');
    expect(controller.relaidRungs).toEqual([0, 1, 2]);
    expect(controller.getLayouts().map(layout => [layout.y, layout.height])).toEqual([
      [50, 200],
      [270, 80],
      [370, 80]
    ]);
  });

  it('moves following rungs down when a comment grows', () => {
    const { controller } = setup([{ text: 'XIC(A)OTE(B);', comment: 'one line' }, ...threeRungs.slice(1)]);
    expect(controller.getLayout(0).height).toBe(95);
    expect(controller.getLayout(1).y).toBe(165);

    controller.setComment(0, 'one\ntwo\nthree\nfour');

    expect(controller.getLayout(0).height).toBe(140);
    expect(controller.getLayout(1).y).toBe(210);
    expect(controller.getLayout(2).y).toBe(310);
    expect(controller.relaidRungs).toEqual([0, 1, 2]);
  });

  it('stops the cascade when the edited rung keeps its height', () => {
    const { controller } = setup(threeRungs);
    controller.setComment(0, 'first');
    controller.setComment(0, 'second');

    expect(controller.relaidRungs).toEqual([0]);
  });

  it('leaves rungs and layouts alone when an edit is rejected', () => {
    const { routine, controller } = setup(threeRungs);
    const before = controller.getLayout(0);

    let caught: unknown;
    try {
      controller.insertElementAt(0, 5, {}, createInstruction('XIO', ['X']));
    } catch (error) {
      caught = error;
    }

    expect(isLadderError(caught, 'PositionOutOfRange')).toBe(true);
    expect(texts(routine)[0]).toBe('XIC(A)OTE(B);');
    expect(controller.getLayout(0)).toBe(before);
  });

  it('restores sequence and layout exactly after insert then delete', () => {
    const { routine, controller } = setup([{ text: 'XIC(A)[XIC(B),XIO(C)]OTE(D);' }, { text: 'XIC(E)OTE(F);' }]);
    const before = controller.getLayouts().map(layout => ({ ...layout }));

    controller.insertElementAt(0, 4, { branchId: 1 }, createInstruction('TON', ['T1', '500', '0']));
    controller.deleteElementAt(0, 4);

    expect(texts(routine)).toEqual(['XIC(A)[XIC(B),XIO(C)]OTE(D);', 'XIC(E)OTE(F);']);
    expect(controller.getLayouts()).toEqual(before);
  });

  it('deletes instructions, rails and whole branches', () => {
    const { routine, controller } = setup([{ text: '[XIC(A),XIO(B)]OTE(C);' }]);

    expect(controller.deleteElementAt(0, 5).map(element => element.kind)).toEqual(['instruction']);
    expect(texts(routine)).toEqual(['[XIC(A),XIO(B)];']);

    controller.deleteElementAt(0, 2);
    expect(texts(routine)).toEqual(['[XIC(A)];']);
    expect(controller.getLayout(0).height).toBe(140);

    controller.deleteElementAt(0, 2);
    expect(texts(routine)).toEqual([';']);
    expect(controller.getLayout(0).height).toBe(80);
  });

  it('moves an instruction within a rung using pre-move positions', () => {
    const { routine, controller } = setup(threeRungs);
    const moved = controller.moveElement({ rungNumber: 0, position: 0 }, { rungNumber: 0, position: 2 });

    expect(moved.position).toBe(1);
    expect(texts(routine)[0]).toBe('OTE(B)XIC(A);');
  });

  it('moves an instruction across rungs', () => {
    const { routine, controller } = setup(threeRungs);
    const moved = controller.moveElement({ rungNumber: 0, position: 0 }, { rungNumber: 1, position: 1 });

    expect(moved.position).toBe(1);
    expect(texts(routine)).toEqual(['OTE(B);', 'XIC(C)XIC(A)OTE(D);', 'XIC(E)OTE(F);']);
    expect(controller.relaidRungs).toEqual([0, 1]);
  });

  it('restores both rungs when a cross-rung move fails', () => {
    const { routine, controller } = setup(threeRungs);

    expect(() =>
      controller.moveElement({ rungNumber: 0, position: 0 }, { rungNumber: 1, position: 1, branchId: 5 })
    ).toThrow('Branch 5 does not exist in this rung.');
    expect(texts(routine)).toEqual(['XIC(A)OTE(B);', 'XIC(C)OTE(D);', 'XIC(E)OTE(F);']);
    expect(controller.getLayout(0).elements).toHaveLength(2);
  });

  it('adds and removes rungs and renumbers the layouts after them', () => {
    const { routine, engine, controller } = setup([{ text: 'XIC(A)OTE(B);' }, { text: '[XIC(C),XIO(D)]OTE(E);' }]);
    expect(engine.arena.forRung(1).map(branch => branch.id)).toEqual([0, 1]);

    expect(controller.addRung({ text: 'XIC(Z)OTE(Z);' }, 0)).toBe(0);
    expect(controller.relaidRungs).toEqual([0, 1, 2]);
    expect(controller.getLayouts().map(layout => [layout.rungNumber, layout.y])).toEqual([
      [0, 50],
      [1, 150],
      [2, 250]
    ]);
    expect(engine.arena.forRung(2).map(branch => branch.id)).toEqual([0, 1]);

    controller.removeRung(2);
    expect(texts(routine)).toEqual(['XIC(Z)OTE(Z);', 'XIC(A)OTE(B);']);
    expect(engine.arena.all()).toEqual([]);
    expect(controller.extent()).toEqual({ rungCount: 2, width: 640, height: 250 });
  });

  it('replaces an instruction and re-lays out its rung', () => {
    const { routine, controller } = setup(threeRungs);
    const replaced = controller.replaceElementAt(0, 0, createInstruction('XIO', ['X']));

    expect(replaced.position).toBe(0);
    expect(texts(routine)[0]).toBe('XIO(X)OTE(B);');
    expect(controller.relaidRungs).toEqual([0]);
    expect(controller.getLayout(0).elements.map(element => element.x)).toEqual([60, 120]);
  });

  it('moves a branch and republishes its geometry', () => {
    const { routine, controller } = setup([{ text: '[XIC(A),XIO(B)]OTE(C);' }, { text: 'XIC(E)OTE(F);' }]);
    expect(controller.getBranch(0)?.startX).toBe(60);

    expect(controller.moveBranch(0, 0, 6, {})).toBe(0);
    expect(texts(routine)).toEqual(['OTE(C)[XIC(A),XIO(B)];', 'XIC(E)OTE(F);']);
    expect(controller.relaidRungs).toEqual([0]);
    expect(controller.getBranches(0).map(branch => [branch.id, branch.startX])).toEqual([
      [0, 120],
      [1, 120]
    ]);
  });

  it('serves branch records under the rung number they moved to', () => {
    const { controller } = setup([{ text: 'XIC(A)OTE(B);' }, { text: '[XIC(C),XIO(D)]OTE(E);' }]);
    controller.removeRung(0);

    expect(controller.getBranches(0).map(branch => [branch.id, branch.rungNumber])).toEqual([
      [0, 0],
      [1, 0]
    ]);
    expect(controller.getBranches(1)).toEqual([]);
    expect(controller.getBranch(1)?.parentBranchId).toBe(0);
  });

  it('reports a missing rung', () => {
    const { controller } = setup(threeRungs);

    expect(() => controller.getLayout(3)).toThrow('Rung 3 is not laid out.');
    expect(() => controller.setComment(3, 'x')).toThrow('Rung 3 does not exist (routine has 3).');
  });
});
