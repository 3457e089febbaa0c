import { LadderError } from '../errors';
import type { Branch, BranchId, LayoutElement, LayoutResult } from '../types';
import type { InsertionTarget, LayoutSource, LocateResult } from './editorTypes';

interface Candidate {
  center: number;
  before: number;
  after: number;
}

function contains(branch: Branch, x: number, y: number): boolean {
  return x >= branch.startX && x <= branch.endX && y >= branch.startY && y <= branch.endY;
}

function area(branch: Branch): number {
  return (branch.endX - branch.startX + 1) * (branch.endY - branch.startY + 1);
}

/** Maps screen coordinates to rungs, branch rails and insertion positions. */
export class InsertionLocator {
  constructor(private readonly source: LayoutSource) {}

  public locate(x: number, y: number): LocateResult {
    const layout = this.rungAt(y);
    if (!layout) {
      return { kind: 'miss', reason: 'NoRungAtCoordinate' };
    }
    // Sibling rail boxes sit inside their parent's box, so the smallest match is the innermost rail.
    const innermost = this.source
      .getBranches(layout.rungNumber)
      .filter(branch => contains(branch, x, y))
      .reduce<Branch | undefined>(
        (best, branch) => (best === undefined || area(branch) <= area(best) ? branch : best),
        undefined
      );
    if (!innermost) {
      return { kind: 'hit', rungNumber: layout.rungNumber, branchLevel: 0 };
    }
    return {
      kind: 'hit',
      rungNumber: layout.rungNumber,
      branchLevel: innermost.branchLevel + 1,
      branchId: innermost.id
    };
  }

  public findInsertionPosition(x: number, rungNumber: number, branchLevel: number, branchId?: BranchId): number {
    const layout = this.requireLayout(rungNumber);
    let rail: Branch | undefined;
    if (branchId !== undefined) {
      rail = this.source.getBranch(branchId);
      if (rail?.rungNumber !== rungNumber) {
        throw new LadderError('BranchNotFound', `Branch ${branchId} is not part of rung ${rungNumber}.`, {
          branchId,
          rungNumber
        });
      }
    }
    const expectedLevel = rail ? rail.branchLevel + 1 : 0;
    if (branchLevel !== expectedLevel) {
      throw new LadderError(
        'InvalidInsertionPoint',
        `Branch level ${branchLevel} does not match ${rail ? `branch ${rail.id}` : 'the main rail'} (level ${expectedLevel}).`,
        { rungNumber, branchLevel, branchId: branchId ?? null }
      );
    }

    const candidates = this.candidatesOn(layout, branchId);
    if (candidates.length === 0) {
      return rail ? rail.startPosition + 1 : 0;
    }
    const nearest = candidates.reduce((best, candidate) =>
      Math.abs(x - candidate.center) < Math.abs(x - best.center) ? candidate : best
    );
    return x < nearest.center ? nearest.before : nearest.after;
  }

  public resolve(x: number, y: number): InsertionTarget {
    const hit = this.locate(x, y);
    if (hit.kind === 'miss') {
      throw new LadderError('NoRungAtCoordinate', `No rung at (${x}, ${y}).`, { x, y });
    }
    const position = this.findInsertionPosition(x, hit.rungNumber, hit.branchLevel, hit.branchId);
    return { rungNumber: hit.rungNumber, branchLevel: hit.branchLevel, branchId: hit.branchId, position };
  }

  /** Topmost element whose rectangle contains the point; instructions win over markers. */
  public elementAt(x: number, y: number): LayoutElement | undefined {
    const layout = this.rungAt(y);
    if (!layout) {
      return undefined;
    }
    const hits = layout.elements.filter(
      element => x >= element.x && x < element.x + element.width && y >= element.y && y < element.y + element.height
    );
    return hits.find(element => element.kind === 'instruction') ?? hits[0];
  }

  private rungAt(y: number): LayoutResult | undefined {
    return this.source.getLayouts().find(layout => y >= layout.y && y < layout.y + layout.height);
  }

  private requireLayout(rungNumber: number): LayoutResult {
    const layout = this.source.getLayouts().find(candidate => candidate.rungNumber === rungNumber);
    if (!layout) {
      throw new LadderError('PositionOutOfRange', `Rung ${rungNumber} is not laid out.`, { rungNumber });
    }
    return layout;
  }

  // A nested branch on the rail is one atomic block: dropping on it lands before or after it whole.
  private candidatesOn(layout: LayoutResult, railId: BranchId | undefined): Candidate[] {
    const candidates: Candidate[] = [];
    for (const element of layout.elements) {
      if (element.railId !== railId) {
        continue;
      }
      if (element.kind === 'instruction') {
        candidates.push({
          center: element.x + element.width / 2,
          before: element.position,
          after: element.position + 1
        });
      } else if (element.kind === 'branchStart' && element.branchId !== undefined) {
        const nested = this.source.getBranch(element.branchId);
        if (nested) {
          candidates.push({
            center: (nested.startX + nested.endX) / 2,
            before: nested.startPosition,
            after: nested.endPosition + 1
          });
        }
      }
    }
    return candidates;
  }
}
