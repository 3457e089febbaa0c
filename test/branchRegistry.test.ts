import { describe, expect, it } from 'vitest';
import { BranchArena, BranchRegistry } from '../src/layout/branchRegistry';
import type { Branch, BranchStartElement } from '../src/types';

function branch(id: number, rungNumber: number): Branch {
  return {
    id,
    rungNumber,
    childBranchIds: [],
    rootBranchId: id,
    startPosition: 0,
    endPosition: 1,
    branchLevel: 0,
    startX: 60,
    endX: 90,
    branchY: 120,
    startY: 120,
    endY: 179
  };
}

const start: BranchStartElement = { kind: 'branchStart', branchId: 4, position: 0, branchLevel: 0, rootBranchId: 4 };

describe('BranchArena', () => {
  it('replaces and renumbers branches per rung', () => {
    const arena = new BranchArena();
    arena.replaceRung(0, [branch(0, 0), branch(1, 0)]);
    arena.replaceRung(1, [branch(2, 1)]);
    arena.replaceRung(0, [branch(1, 0)]);

    expect(arena.get(0)).toBeUndefined();
    expect(arena.forRung(0).map(item => item.id)).toEqual([1]);

    arena.renumberRungs(rungNumber => (rungNumber === 0 ? undefined : rungNumber - 1));
    expect(arena.all().map(item => [item.id, item.rungNumber])).toEqual([[2, 0]]);
    expect(arena.get(1)).toBeUndefined();
  });
});

describe('BranchRegistry', () => {
  it('refuses to commit while a branch is open', () => {
    const registry = new BranchRegistry();
    registry.begin(0);
    registry.open(start, { rungNumber: 0, startX: 60, markerWidth: 10, row: 1, rowY: 120, parentRailId: undefined });

    expect(registry.depth).toBe(1);
    expect(() => registry.commit()).toThrow('Branch 4 is never closed.');

    registry.abort();
    expect(registry.depth).toBe(0);
    expect(registry.arena.all()).toEqual([]);
  });

  it('rejects a close that does not match the open branch', () => {
    const registry = new BranchRegistry();
    registry.begin(0);
    registry.open(start, { rungNumber: 0, startX: 60, markerWidth: 10, row: 1, rowY: 120, parentRailId: undefined });

    expect(() =>
      registry.close({ kind: 'branchEnd', branchId: 5, position: 2, branchLevel: 0 }, () => ({ endX: 100, endY: 179 }))
    ).toThrow('Branch end 5 at position 2 closes open branch 4.');
  });

  it('reconciles sibling rails when a branch closes', () => {
    const registry = new BranchRegistry();
    registry.begin(3);
    registry.open(start, { rungNumber: 3, startX: 60, markerWidth: 10, row: 1, rowY: 120, parentRailId: undefined });
    const child = registry.next({ kind: 'branchNext', branchId: 5, position: 2, branchLevel: 1 }, row => 60 + row * 60);
    registry.close({ kind: 'branchEnd', branchId: 4, position: 4, branchLevel: 0 }, context => ({
      endX: context.maxRight + 30,
      endY: 239
    }));
    const branches = registry.commit();

    expect(child).toMatchObject({ id: 5, parentBranchId: 4, branchY: 180, endPosition: 3, endX: 100, endY: 239 });
    expect(branches.map(item => item.id)).toEqual([4, 5]);
    expect(branches[0]).toMatchObject({ childBranchIds: [5], endPosition: 4, endX: 100, endY: 239 });
    expect(registry.arena.forRung(3)).toHaveLength(2);
  });
});
