import { sizeForCategory, type ElementSize, type LayoutConfig } from '../config';
import type { Rung } from '../ladder/rung';
import type { BranchId, InstructionCategory, LayoutElement, LayoutResult, RungElement } from '../types';
import { BranchArena, BranchRegistry, type RailCursor } from './branchRegistry';

export interface RungLayoutInput {
  rungNumber: number;
  y: number;
  elements: readonly RungElement[];
  commentLines: number;
}

/**
 * Lays out one rung at a time in a single left-to-right pass. Output depends only on the element
 * sequence, the comment line count, the rung's y and the configuration.
 */
export class LayoutEngine {
  private readonly registry: BranchRegistry;

  constructor(
    private readonly config: LayoutConfig,
    arena: BranchArena = new BranchArena()
  ) {
    this.registry = new BranchRegistry(arena);
  }

  public get arena(): BranchArena {
    return this.registry.arena;
  }

  public get layoutConfig(): LayoutConfig {
    return this.config;
  }

  public layoutRung(rung: Rung, rungNumber: number, y: number): LayoutResult {
    return this.layout({ rungNumber, y, elements: rung.getElements(), commentLines: rung.commentLineCount() });
  }

  public layout(input: RungLayoutInput): LayoutResult {
    this.registry.begin(input.rungNumber);
    try {
      return this.walk(input);
    } catch (error) {
      this.registry.abort();
      throw error;
    }
  }

  private walk(input: RungLayoutInput): LayoutResult {
    const { config, registry } = this;
    const { rungNumber } = input;
    const commentHeight = input.commentLines * config.commentLineHeight;
    const baseY = input.y + config.rungPadding + commentHeight;
    const rowY = (row: number): number => baseY + row * config.branchSpacing;
    const marker = config.sizes.branchMarker;

    const mainRail: RailCursor = { railId: undefined, originX: config.leftRailX, row: 0 };
    const currentRail = (): RailCursor => registry.top()?.rail ?? mainRail;
    let maxRow = 0;
    let rightEdge = config.leftRailX;

    const place = (rail: RailCursor, width: number): number => {
      const x =
        rail.prevRight === undefined
          ? rail.originX + config.railOffset
          : rail.prevRight + config.elementSpacing + config.minimumWireLength;
      rail.prevRight = x + width;
      const context = registry.top();
      if (context) {
        context.maxRight = Math.max(context.maxRight, x + width);
      }
      rightEdge = Math.max(rightEdge, x + width);
      return x;
    };

    const elements: LayoutElement[] = [];
    const emit = (
      element: RungElement,
      x: number,
      y: number,
      size: ElementSize,
      railId: BranchId | undefined,
      category?: InstructionCategory
    ): void => {
      elements.push({
        kind: element.kind,
        ...(category ? { category } : {}),
        x,
        y,
        width: size.width,
        height: size.height,
        rungNumber,
        position: element.position,
        branchLevel: element.branchLevel,
        branchId: element.branchId,
        railId,
        element,
        selected: false
      });
    };

    for (const element of input.elements) {
      switch (element.kind) {
        case 'instruction': {
          const rail = currentRail();
          const size = sizeForCategory(config, element.instruction.category);
          const x = place(rail, size.width);
          emit(element, x, rowY(rail.row), size, rail.railId, element.instruction.category);
          break;
        }
        case 'branchStart': {
          const rail = currentRail();
          const x = place(rail, marker.width);
          const row = rail.row + 1;
          registry.open(element, {
            rungNumber,
            startX: x,
            markerWidth: marker.width,
            row,
            rowY: rowY(row),
            parentRailId: rail.railId
          });
          maxRow = Math.max(maxRow, row);
          emit(element, x, rowY(rail.row), marker, rail.railId);
          break;
        }
        case 'branchNext': {
          const child = registry.next(element, rowY);
          const rail = currentRail();
          maxRow = Math.max(maxRow, rail.row);
          emit(element, child.startX, child.branchY, marker, child.id);
          break;
        }
        case 'branchEnd': {
          let markerX = 0;
          registry.close(element, context => {
            markerX = context.maxRight + config.elementSpacing + config.minimumWireLength;
            return {
              endX: markerX + marker.width,
              endY: rowY(context.maxRow) + config.branchSpacing - 1
            };
          });
          const rail = currentRail();
          rail.prevRight = markerX + marker.width;
          rightEdge = Math.max(rightEdge, rail.prevRight);
          emit(element, markerX, rowY(rail.row), marker, rail.railId);
          break;
        }
      }
    }

    const branches = registry.commit();
    const rowCount = maxRow + 1;
    const maxBranchDepth = branches.reduce((depth, branch) => Math.max(depth, branch.branchLevel + 1), 0);

    return {
      rungNumber,
      y: input.y,
      height: 2 * config.rungPadding + commentHeight + rowCount * config.branchSpacing,
      commentHeight,
      rowCount,
      maxBranchDepth,
      rightEdge,
      rightRailX: Math.max(config.rightRailMinX, rightEdge + config.railOffset),
      elements,
      branches
    };
  }
}
