import { LadderError } from '../errors';
import type { BranchId, RoutineSnapshot, RoutineSource } from '../types';
import { Rung, type RungInit } from './rung';

// Hands out dense integer branch handles for every rung of one routine.
export class BranchIdAllocator {
  private next = 0;

  public allocate(): BranchId {
    return this.next++;
  }
}

export class Routine {
  private readonly rungs: Rung[] = [];
  private readonly yPositions: number[] = [];
  private readonly heights: number[] = [];
  private readonly branchIds = new BranchIdAllocator();

  constructor(public name = 'MainRoutine') {}

  public static fromSource(source: RoutineSource): Routine {
    const routine = new Routine(source.name);
    source.rungs.forEach(rung => routine.addRung(rung));
    return routine;
  }

  public get rungCount(): number {
    return this.rungs.length;
  }

  public get rungYPositions(): readonly number[] {
    return this.yPositions;
  }

  public get rungHeights(): readonly number[] {
    return this.heights;
  }

  public getRungs(): readonly Rung[] {
    return this.rungs;
  }

  public getRung(rungNumber: number): Rung {
    if (!Number.isInteger(rungNumber) || rungNumber < 0 || rungNumber >= this.rungs.length) {
      throw new LadderError('PositionOutOfRange', `Rung ${rungNumber} does not exist (routine has ${this.rungs.length}).`, {
        rungNumber,
        rungCount: this.rungs.length
      });
    }
    return this.rungs[rungNumber];
  }

  public createRung(init: RungInit = {}): Rung {
    return new Rung(() => this.branchIds.allocate(), init);
  }

  public addRung(init: RungInit = {}, index = this.rungs.length): Rung {
    if (!Number.isInteger(index) || index < 0 || index > this.rungs.length) {
      throw new LadderError('PositionOutOfRange', `Cannot insert a rung at ${index} (routine has ${this.rungs.length}).`, {
        rungNumber: index
      });
    }
    const rung = this.createRung(init);
    this.rungs.splice(index, 0, rung);
    // Geometry is unknown until the rung is laid out.
    this.yPositions.splice(index, 0, Number.NaN);
    this.heights.splice(index, 0, Number.NaN);
    return rung;
  }

  public removeRung(rungNumber: number): Rung {
    const rung = this.getRung(rungNumber);
    this.rungs.splice(rungNumber, 1);
    this.yPositions.splice(rungNumber, 1);
    this.heights.splice(rungNumber, 1);
    return rung;
  }

  public setGeometry(rungNumber: number, y: number, height: number): void {
    this.getRung(rungNumber);
    this.yPositions[rungNumber] = y;
    this.heights[rungNumber] = height;
  }

  public toSnapshot(): RoutineSnapshot {
    return {
      name: this.name,
      rungs: this.rungs.map((rung, number) => ({
        number,
        text: rung.toText(),
        ...(rung.comment !== undefined ? { comment: rung.comment } : {})
      }))
    };
  }
}
