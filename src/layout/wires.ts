import type { LayoutConfig } from '../config';
import type { Branch, LayoutElement, LayoutResult, WireSegment } from '../types';

interface RailRun {
  startX: number;
  endX: number;
  wireY: number;
  members: LayoutElement[];
}

/**
 * Connecting wires for a laid-out rung: power rails, horizontal runs between adjacent elements
 * on each rail, and the vertical drops at either side of every branch.
 */
export function deriveWires(layout: LayoutResult, config: LayoutConfig): WireSegment[] {
  const { rungNumber } = layout;
  const wireOffset = Math.round(config.sizes.contact.height / 2);
  const markerWidth = config.sizes.branchMarker.width;
  const mainY = layout.y + config.rungPadding + layout.commentHeight + wireOffset;
  const segments: WireSegment[] = [];
  const push = (x1: number, y1: number, x2: number, y2: number): void => {
    if (x1 !== x2 || y1 !== y2) {
      segments.push({ rungNumber, x1, y1, x2, y2 });
    }
  };

  push(config.leftRailX, layout.y, config.leftRailX, layout.y + layout.height);
  push(layout.rightRailX, layout.y, layout.rightRailX, layout.y + layout.height);

  const runs: RailRun[] = [
    {
      startX: config.leftRailX,
      endX: layout.rightRailX,
      wireY: mainY,
      members: layout.elements.filter(element => element.railId === undefined)
    },
    ...layout.branches.map(branch => ({
      startX: branch.startX,
      endX: branch.endX - markerWidth,
      wireY: branch.branchY + wireOffset,
      members: layout.elements.filter(element => element.railId === branch.id && element.kind !== 'branchNext')
    }))
  ];

  for (const run of runs) {
    let cursor = run.startX;
    let previous: LayoutElement | undefined;
    for (const member of run.members) {
      // The rail itself carries no current between a branch's open and close markers.
      const bridgesBranch =
        member.kind === 'branchEnd' && previous?.kind === 'branchStart' && previous.branchId === member.branchId;
      if (!bridgesBranch && member.x > cursor) {
        push(cursor, run.wireY, member.x, run.wireY);
      }
      cursor = member.x + member.width;
      previous = member;
    }
    if (run.endX > cursor) {
      push(cursor, run.wireY, run.endX, run.wireY);
    }
  }

  const siblingIds = new Set(layout.branches.flatMap(branch => branch.childBranchIds));
  for (const branch of layout.branches.filter(candidate => !siblingIds.has(candidate.id))) {
    const opener = layout.elements.find(element => element.kind === 'branchStart' && element.branchId === branch.id);
    if (!opener) {
      continue;
    }
    const parentY = opener.y + wireOffset;
    const lowest = lastRail(branch, layout.branches);
    const bottomY = lowest.branchY + wireOffset;
    push(branch.startX, parentY, branch.startX, bottomY);
    push(branch.endX - markerWidth, parentY, branch.endX - markerWidth, bottomY);
  }

  return segments;
}

function lastRail(branch: Branch, branches: readonly Branch[]): Branch {
  const lastId = branch.childBranchIds[branch.childBranchIds.length - 1];
  return branches.find(candidate => candidate.id === lastId) ?? branch;
}
