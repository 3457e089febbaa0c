import { describeError, isLadderError } from '../errors';
import { DEFAULT_INSTRUCTIONS } from '../ladder/instructions';
import type { BranchId, InstructionCategory, InstructionRef, LayoutResult } from '../types';
import type { DisposableLike, InsertionTarget } from './editorTypes';
import type { LadderEditor } from './ladderEditor';
import type { ElementAddress } from './mutationController';

export type ToolMode = 'view' | 'insertContact' | 'insertCoil' | 'insertBlock' | 'insertBranch';

export type EditorMode = ToolMode | 'connectBranch' | 'drag';

export type SessionOutcome =
  | { kind: 'inserted'; rungNumber: number; position: number }
  | { kind: 'anchored'; anchor: InsertionTarget }
  | { kind: 'connected'; rungNumber: number; branchId: BranchId }
  | { kind: 'selected'; selection?: ElementAddress }
  | { kind: 'moved'; rungNumber: number; position: number }
  | { kind: 'ignored'; reason: string };

export interface EditorSessionOptions {
  instructions?: Partial<Record<InstructionCategory, InstructionRef>>;
}

const INSERT_MODES: Readonly<Partial<Record<EditorMode, InstructionCategory>>> = {
  insertContact: 'contact',
  insertCoil: 'coil',
  insertBlock: 'block'
};

/**
 * Pointer-driven editing modes on top of a LadderEditor. Recoverable placement errors leave the
 * routine untouched and come back as an `ignored` outcome; anything else propagates.
 */
export class LadderEditorSession {
  private mode: EditorMode = 'view';
  private anchor: InsertionTarget | undefined;
  private selection: ElementAddress | undefined;
  private clipboard: InstructionRef | undefined;
  private readonly instructions: Record<InstructionCategory, InstructionRef>;
  private readonly layoutSubscription: DisposableLike;

  constructor(
    private readonly editor: LadderEditor,
    options: EditorSessionOptions = {}
  ) {
    this.instructions = { ...DEFAULT_INSTRUCTIONS, ...options.instructions };
    // Any committed edit may shift positions, so a selection only lives until the next one.
    this.layoutSubscription = editor.onLayout(() => {
      this.selection = undefined;
      if (this.mode === 'drag') {
        this.mode = 'view';
      }
    });
  }

  public getMode(): EditorMode {
    return this.mode;
  }

  public getAnchor(): InsertionTarget | undefined {
    return this.anchor;
  }

  public getSelection(): ElementAddress | undefined {
    return this.selection;
  }

  public getClipboard(): InstructionRef | undefined {
    return this.clipboard;
  }

  public setMode(mode: ToolMode): void {
    this.anchor = undefined;
    this.selection = undefined;
    this.mode = mode;
  }

  public cancel(): void {
    this.anchor = undefined;
    this.mode = 'view';
  }

  public click(x: number, y: number): SessionOutcome {
    const category = INSERT_MODES[this.mode];
    if (category) {
      return this.finish(() => {
        const placed = this.editor.insertInstructionAtPoint(x, y, this.instructions[category]);
        return { kind: 'inserted', rungNumber: placed.rungNumber, position: placed.element.position };
      });
    }

    switch (this.mode) {
      case 'insertBranch':
        return this.captureAnchor(x, y);
      case 'connectBranch':
        return this.connect(x, y);
      case 'drag':
        return this.release(x, y);
      default:
        return this.select(x, y);
    }
  }

  /** Where a click at (x, y) would insert, for hover previews. Undefined in view mode or off-rung. */
  public hover(x: number, y: number): InsertionTarget | undefined {
    if (this.mode === 'view') {
      return undefined;
    }
    try {
      return this.editor.resolveInsertion(x, y);
    } catch (error) {
      if (isLadderError(error) && error.recoverable) {
        return undefined;
      }
      throw error;
    }
  }

  public beginDrag(): boolean {
    if (this.mode !== 'view' || !this.selection) {
      return false;
    }
    this.mode = 'drag';
    return true;
  }

  /** Drops the dragged instruction. The session is back in view mode afterwards either way. */
  public release(x: number, y: number): SessionOutcome {
    const from = this.selection;
    if (this.mode !== 'drag' || !from) {
      return { kind: 'ignored', reason: 'No drag in progress.' };
    }
    this.mode = 'view';
    this.selection = undefined;
    return this.attempt(() => {
      const target = this.editor.resolveInsertion(x, y);
      const moved = this.editor.moveElement(from, target);
      return { kind: 'moved', rungNumber: target.rungNumber, position: moved.position };
    });
  }

  /** Copies the selected instruction. Returns false when nothing is selected. */
  public copySelection(): boolean {
    const selected = this.selection;
    if (!selected) {
      return false;
    }
    const element = this.editor.getRoutine().getRung(selected.rungNumber).getElement(selected.position);
    if (element.kind !== 'instruction') {
      return false;
    }
    this.clipboard = element.instruction;
    return true;
  }

  public paste(x: number, y: number): SessionOutcome {
    const instruction = this.clipboard;
    if (!instruction) {
      return { kind: 'ignored', reason: 'Clipboard is empty.' };
    }
    return this.attempt(() => {
      const placed = this.editor.insertInstructionAtPoint(x, y, instruction);
      return { kind: 'inserted', rungNumber: placed.rungNumber, position: placed.element.position };
    });
  }

  public dispose(): void {
    this.layoutSubscription.dispose();
  }

  /** Layout of a rung with the current selection flagged. */
  public getLayout(rungNumber: number): LayoutResult {
    const layout = this.editor.getLayout(rungNumber);
    const selected = this.selection;
    if (!selected || selected.rungNumber !== rungNumber) {
      return layout;
    }
    return {
      ...layout,
      elements: layout.elements.map(element =>
        element.position === selected.position ? { ...element, selected: true } : element
      )
    };
  }

  private select(x: number, y: number): SessionOutcome {
    const hit = this.editor.elementAt(x, y);
    this.selection = hit?.kind === 'instruction' ? { rungNumber: hit.rungNumber, position: hit.position } : undefined;
    return { kind: 'selected', selection: this.selection };
  }

  private captureAnchor(x: number, y: number): SessionOutcome {
    return this.attempt(() => {
      const anchor = this.editor.resolveInsertion(x, y);
      this.anchor = anchor;
      this.mode = 'connectBranch';
      return { kind: 'anchored', anchor };
    });
  }

  private connect(x: number, y: number): SessionOutcome {
    const anchor = this.anchor;
    this.anchor = undefined;
    this.mode = 'view';
    if (!anchor) {
      return { kind: 'ignored', reason: 'No branch anchor.' };
    }
    return this.attempt(() => {
      const target = this.editor.resolveInsertion(x, y);
      if (target.rungNumber !== anchor.rungNumber || target.branchId !== anchor.branchId) {
        return { kind: 'ignored', reason: 'Branch ends must sit on the same rail of the same rung.' };
      }
      const start = Math.min(anchor.position, target.position);
      const end = Math.max(anchor.position, target.position);
      const branchId = this.editor.insertBranch(anchor.rungNumber, start, end, { branchId: anchor.branchId });
      return { kind: 'connected', rungNumber: anchor.rungNumber, branchId };
    });
  }

  // Insert tools drop back to view mode once the click is handled.
  private finish(operation: () => SessionOutcome): SessionOutcome {
    this.mode = 'view';
    return this.attempt(operation);
  }

  private attempt(operation: () => SessionOutcome): SessionOutcome {
    try {
      return operation();
    } catch (error) {
      if (isLadderError(error) && error.recoverable) {
        const reason = describeError(error);
        this.editor.log({ level: 'info', scope: 'session', message: `Ignored pointer action: ${reason}` });
        return { kind: 'ignored', reason };
      }
      throw error;
    }
  }
}
