import { LadderError } from '../errors';
import type { BranchId, RungElement, RungElementDraft } from '../types';

interface OpenBranchFrame {
  branchId: BranchId;
  railId: BranchId;
}

function unbalanced(message: string, details?: Record<string, unknown>): LadderError {
  return new LadderError('UnbalancedBranch', message, details);
}

/**
 * Derives position, nesting level, rail and root branch for every draft in one left-to-right
 * walk. Throws UnbalancedBranch when markers do not pair up.
 */
export function annotateSequence(drafts: readonly RungElementDraft[]): RungElement[] {
  const stack: OpenBranchFrame[] = [];
  const claimed = new Set<BranchId>();
  const elements: RungElement[] = [];

  const claim = (branchId: BranchId, position: number): void => {
    if (claimed.has(branchId)) {
      throw unbalanced(`Branch id ${branchId} is used twice (position ${position}).`, { branchId, position });
    }
    claimed.add(branchId);
  };

  drafts.forEach((draft, position) => {
    const top = stack.length > 0 ? stack[stack.length - 1] : undefined;
    const rootBranchId = stack.length > 0 ? stack[0].branchId : undefined;

    switch (draft.kind) {
      case 'instruction':
        elements.push({
          kind: 'instruction',
          instruction: draft.instruction,
          position,
          branchLevel: stack.length,
          branchId: top?.railId,
          railId: top?.railId,
          rootBranchId
        });
        return;
      case 'branchStart':
        claim(draft.branchId, position);
        elements.push({
          kind: 'branchStart',
          branchId: draft.branchId,
          position,
          branchLevel: stack.length,
          railId: top?.railId,
          rootBranchId: rootBranchId ?? draft.branchId
        });
        stack.push({ branchId: draft.branchId, railId: draft.branchId });
        return;
      case 'branchNext':
        if (!top) {
          throw unbalanced(`Branch rail at position ${position} is outside any branch.`, { position });
        }
        claim(draft.branchId, position);
        top.railId = draft.branchId;
        elements.push({
          kind: 'branchNext',
          branchId: draft.branchId,
          position,
          branchLevel: stack.length,
          railId: draft.branchId,
          rootBranchId
        });
        return;
      case 'branchEnd': {
        const frame = stack.pop();
        if (!frame) {
          throw unbalanced(`Branch end at position ${position} has no open branch.`, { position });
        }
        if (frame.branchId !== draft.branchId) {
          throw unbalanced(`Branch end ${draft.branchId} at position ${position} closes open branch ${frame.branchId}.`, {
            expected: frame.branchId,
            actual: draft.branchId,
            position
          });
        }
        const parent = stack.length > 0 ? stack[stack.length - 1] : undefined;
        elements.push({
          kind: 'branchEnd',
          branchId: draft.branchId,
          position,
          branchLevel: stack.length,
          railId: parent?.railId,
          rootBranchId: stack.length > 0 ? stack[0].branchId : draft.branchId
        });
        return;
      }
    }
  });

  if (stack.length > 0) {
    const open = stack[stack.length - 1];
    throw unbalanced(`Branch ${open.branchId} is never closed.`, { branchId: open.branchId });
  }
  return elements;
}

export function toDraft(element: RungElement): RungElementDraft {
  return element.kind === 'instruction'
    ? { kind: 'instruction', instruction: element.instruction }
    : { kind: element.kind, branchId: element.branchId };
}

export function toDrafts(elements: readonly RungElement[]): RungElementDraft[] {
  return elements.map(toDraft);
}

/** Rail an insertion at `gap` (the index the new element would take) lands on. */
export function railAtGap(elements: readonly RungElement[], gap: number): BranchId | undefined {
  if (gap <= 0) {
    return undefined;
  }
  const previous = elements[gap - 1];
  return previous.kind === 'branchStart' ? previous.branchId : previous.railId;
}

export function hasRail(elements: readonly RungElement[], railId: BranchId): boolean {
  return elements.some(element => element.kind !== 'instruction' && element.kind !== 'branchEnd' && element.branchId === railId);
}

/** Index of the BranchEnd matching the BranchStart at `startIndex`. */
export function findBranchEnd(elements: readonly RungElement[], startIndex: number): number {
  const start = elements[startIndex];
  for (let index = startIndex + 1; index < elements.length; index++) {
    const element = elements[index];
    if (element.kind === 'branchEnd' && element.branchId === start.branchId) {
      return index;
    }
  }
  throw unbalanced(`Branch starting at position ${startIndex} is never closed.`, { position: startIndex });
}

/**
 * Index just past the rail opened by the marker at `markerIndex`: the next sibling marker or the
 * closing BranchEnd of the same branch.
 */
export function findRailEnd(elements: readonly RungElement[], markerIndex: number): number {
  let depth = 0;
  for (let index = markerIndex + 1; index < elements.length; index++) {
    const element = elements[index];
    if (element.kind === 'branchStart') {
      depth++;
    } else if (element.kind === 'branchEnd') {
      if (depth === 0) {
        return index;
      }
      depth--;
    } else if (element.kind === 'branchNext' && depth === 0) {
      return index;
    }
  }
  throw unbalanced(`Rail opened at position ${markerIndex} is never closed.`, { position: markerIndex });
}

/** True when `[start, end)` holds whole branches only and never crosses onto a sibling rail. */
export function isSelfContainedRun(elements: readonly RungElement[], start: number, end: number): boolean {
  let depth = 0;
  for (let index = start; index < end; index++) {
    const element = elements[index];
    if (element.kind === 'branchStart') {
      depth++;
    } else if (element.kind === 'branchEnd') {
      depth--;
      if (depth < 0) {
        return false;
      }
    } else if (element.kind === 'branchNext' && depth === 0) {
      return false;
    }
  }
  return depth === 0;
}

export function maxBranchDepthOf(elements: readonly RungElement[]): number {
  return elements.reduce(
    (depth, element) => (element.kind === 'branchStart' ? Math.max(depth, element.branchLevel + 1) : depth),
    0
  );
}
