export type BranchId = number;

export type InstructionCategory = 'contact' | 'coil' | 'block';

export interface InstructionRef {
  mnemonic: string;
  operands: string[];
  // Canonical MNEMONIC(op1,op2) form, as written back into rung text.
  text: string;
  category: InstructionCategory;
}

export type RungElementKind = 'instruction' | 'branchStart' | 'branchNext' | 'branchEnd';

export type BranchMarkerKind = Exclude<RungElementKind, 'instruction'>;

export interface RungElementState {
  position: number;
  branchLevel: number;
  /** Rail the element sits on. Undefined on the main rail. */
  railId?: BranchId;
  rootBranchId?: BranchId;
}

export interface InstructionElement extends RungElementState {
  kind: 'instruction';
  instruction: InstructionRef;
  branchId?: BranchId;
}

export interface BranchStartElement extends RungElementState {
  kind: 'branchStart';
  branchId: BranchId;
}

export interface BranchNextElement extends RungElementState {
  kind: 'branchNext';
  branchId: BranchId;
}

export interface BranchEndElement extends RungElementState {
  kind: 'branchEnd';
  branchId: BranchId;
}

export type RungElement = InstructionElement | BranchStartElement | BranchNextElement | BranchEndElement;

export type RungElementDraft =
  | { kind: 'instruction'; instruction: InstructionRef }
  | { kind: BranchMarkerKind; branchId: BranchId };

export interface BranchContext {
  // Rail to insert into; omitted for the main rail.
  branchId?: BranchId;
}

export interface Branch {
  id: BranchId;
  rungNumber: number;
  parentBranchId?: BranchId;
  childBranchIds: BranchId[];
  rootBranchId: BranchId;
  startPosition: number;
  endPosition: number;
  branchLevel: number;
  startX: number;
  endX: number;
  branchY: number;
  startY: number;
  endY: number;
}

export interface LayoutElement {
  kind: RungElementKind;
  category?: InstructionCategory;
  x: number;
  y: number;
  width: number;
  height: number;
  rungNumber: number;
  position: number;
  branchLevel: number;
  branchId?: BranchId;
  railId?: BranchId;
  element: RungElement;
  selected: boolean;
}

export interface LayoutResult {
  rungNumber: number;
  y: number;
  height: number;
  commentHeight: number;
  rowCount: number;
  maxBranchDepth: number;
  rightEdge: number;
  rightRailX: number;
  elements: LayoutElement[];
  branches: Branch[];
}

export interface WireSegment {
  rungNumber: number;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface RoutineExtent {
  rungCount: number;
  width: number;
  height: number;
}

export interface RungSource {
  text: string;
  comment?: string;
}

export interface RoutineSource {
  name?: string;
  rungs: RungSource[];
}

export interface RungSnapshot {
  number: number;
  text: string;
  comment?: string;
}

export interface RoutineSnapshot {
  name: string;
  rungs: RungSnapshot[];
}
