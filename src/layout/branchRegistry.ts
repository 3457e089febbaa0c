import { LadderError } from '../errors';
import type { Branch, BranchEndElement, BranchId, BranchNextElement, BranchStartElement } from '../types';

export interface RailCursor {
  railId: BranchId | undefined;
  originX: number;
  row: number;
  // Right edge of the last element placed on this rail.
  prevRight?: number;
}

export interface OpenBranchContext {
  branch: Branch;
  rail: RailCursor;
  children: Branch[];
  maxRight: number;
  maxRow: number;
}

export interface BranchOpening {
  rungNumber: number;
  startX: number;
  markerWidth: number;
  row: number;
  rowY: number;
  parentRailId: BranchId | undefined;
}

export interface BranchClosing {
  endX: number;
  endY: number;
}

// Closed branches of a routine, indexed by their integer handle.
export class BranchArena {
  private readonly slots: Array<Branch | undefined> = [];

  public get(id: BranchId): Branch | undefined {
    return this.slots[id];
  }

  public forRung(rungNumber: number): Branch[] {
    return this.all().filter(branch => branch.rungNumber === rungNumber);
  }

  public all(): Branch[] {
    return this.slots.filter((branch): branch is Branch => branch !== undefined);
  }

  public replaceRung(rungNumber: number, branches: readonly Branch[]): void {
    this.clearRung(rungNumber);
    branches.forEach(branch => {
      this.slots[branch.id] = branch;
    });
  }

  public clearRung(rungNumber: number): void {
    this.slots.forEach((branch, id) => {
      if (branch?.rungNumber === rungNumber) {
        this.slots[id] = undefined;
      }
    });
  }

  /** Moves records to new rung numbers after rungs are added or removed; `undefined` drops them. */
  public renumberRungs(map: (rungNumber: number) => number | undefined): void {
    this.slots.forEach((branch, id) => {
      if (!branch) {
        return;
      }
      const rungNumber = map(branch.rungNumber);
      this.slots[id] = rungNumber === undefined ? undefined : { ...branch, rungNumber };
    });
  }

  public clear(): void {
    this.slots.length = 0;
  }
}

/**
 * Tracks open branches during one left-to-right layout pass. Branches closed during the pass
 * reach the arena only when the pass commits.
 */
export class BranchRegistry {
  private readonly stack: OpenBranchContext[] = [];
  private pending: Branch[] = [];
  private rungNumber: number | undefined;

  constructor(public readonly arena: BranchArena = new BranchArena()) {}

  public begin(rungNumber: number): void {
    this.stack.length = 0;
    this.pending = [];
    this.rungNumber = rungNumber;
  }

  public get depth(): number {
    return this.stack.length;
  }

  public top(): OpenBranchContext | undefined {
    return this.stack.length > 0 ? this.stack[this.stack.length - 1] : undefined;
  }

  public open(element: BranchStartElement, opening: BranchOpening): OpenBranchContext {
    const branch: Branch = {
      id: element.branchId,
      rungNumber: opening.rungNumber,
      parentBranchId: opening.parentRailId,
      childBranchIds: [],
      rootBranchId: element.rootBranchId ?? element.branchId,
      startPosition: element.position,
      endPosition: element.position,
      branchLevel: element.branchLevel,
      startX: opening.startX,
      endX: opening.startX + opening.markerWidth,
      branchY: opening.rowY,
      startY: opening.rowY,
      endY: opening.rowY
    };
    const context: OpenBranchContext = {
      branch,
      rail: { railId: branch.id, originX: opening.startX, row: opening.row },
      children: [],
      maxRight: branch.endX,
      maxRow: opening.row
    };
    this.stack.push(context);
    this.pending.push(branch);
    return context;
  }

  /** Opens a sibling rail below everything the current branch has used so far. */
  public next(element: BranchNextElement, rowY: (row: number) => number): Branch {
    const context = this.top();
    if (!context) {
      throw new LadderError('UnbalancedBranch', `Branch rail ${element.branchId} at position ${element.position} has no open branch.`, {
        branchId: element.branchId,
        position: element.position
      });
    }
    const row = context.maxRow + 1;
    const parent = context.branch;
    const child: Branch = {
      id: element.branchId,
      rungNumber: parent.rungNumber,
      parentBranchId: parent.id,
      childBranchIds: [],
      rootBranchId: parent.rootBranchId,
      startPosition: element.position,
      endPosition: element.position,
      branchLevel: parent.branchLevel,
      startX: parent.startX,
      endX: parent.endX,
      branchY: rowY(row),
      startY: rowY(row),
      endY: rowY(row)
    };
    parent.childBranchIds.push(child.id);
    context.children.push(child);
    context.rail = { railId: child.id, originX: parent.startX, row };
    context.maxRow = row;
    this.pending.push(child);
    return child;
  }

  public close(element: BranchEndElement, geometryFor: (context: OpenBranchContext) => BranchClosing): Branch {
    const context = this.stack.pop();
    if (!context) {
      throw new LadderError('UnbalancedBranch', `Branch end ${element.branchId} at position ${element.position} has no open branch.`, {
        branchId: element.branchId,
        position: element.position
      });
    }
    if (context.branch.id !== element.branchId) {
      throw new LadderError(
        'UnbalancedBranch',
        `Branch end ${element.branchId} at position ${element.position} closes open branch ${context.branch.id}.`,
        { expected: context.branch.id, actual: element.branchId, position: element.position }
      );
    }

    const { endX, endY } = geometryFor(context);
    const branch = context.branch;
    branch.endPosition = element.position;
    branch.endX = endX;
    branch.endY = endY;
    this.reconcileChildren(context, element.position);

    const parent = this.top();
    if (parent) {
      parent.maxRow = Math.max(parent.maxRow, context.maxRow);
      parent.maxRight = Math.max(parent.maxRight, endX);
    }
    return branch;
  }

  /** Ends the pass, publishing its branches for the rung. Throws if a branch is still open. */
  public commit(): Branch[] {
    const open = this.top();
    if (open) {
      throw new LadderError('UnbalancedBranch', `Branch ${open.branch.id} is never closed.`, { branchId: open.branch.id });
    }
    const branches = this.pending;
    if (this.rungNumber !== undefined) {
      this.arena.replaceRung(this.rungNumber, branches);
    }
    this.pending = [];
    this.rungNumber = undefined;
    return branches;
  }

  public abort(): void {
    this.stack.length = 0;
    this.pending = [];
    this.rungNumber = undefined;
  }

  // Each sibling rail ends just above the next one; the last ends with its parent.
  private reconcileChildren(context: OpenBranchContext, closingPosition: number): void {
    const { branch, children } = context;
    children.forEach((child, index) => {
      const following = children[index + 1];
      child.endPosition = following ? following.startPosition - 1 : closingPosition - 1;
      child.endY = following ? following.branchY - 1 : branch.endY;
      child.endX = branch.endX;
    });
  }
}
