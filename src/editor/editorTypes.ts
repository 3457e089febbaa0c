import type { Branch, BranchId, InstructionElement, LayoutResult, RoutineExtent } from '../types';

export interface DisposableLike {
  dispose(): void;
}

export interface EditorLogEvent {
  level: 'info' | 'warn' | 'error';
  scope: string;
  message: string;
  details?: Record<string, unknown>;
}

export type EditorLogListener = (event: EditorLogEvent) => void;

export interface LayoutChangeEvent {
  // Rungs re-laid out by the last mutation, in processing order.
  rungNumbers: number[];
  extent: RoutineExtent;
}

export type LayoutChangeListener = (event: LayoutChangeEvent) => void;

export interface LayoutSource {
  getLayouts(): readonly LayoutResult[];
  getBranches(rungNumber: number): readonly Branch[];
  getBranch(branchId: BranchId): Branch | undefined;
}

export type LocateResult =
  | { kind: 'hit'; rungNumber: number; branchLevel: number; branchId?: BranchId }
  | { kind: 'miss'; reason: 'NoRungAtCoordinate' };

export interface InsertionTarget {
  rungNumber: number;
  branchLevel: number;
  branchId?: BranchId;
  position: number;
}

export interface PlacedInstruction {
  rungNumber: number;
  element: InstructionElement;
}
