import { describe, expect, it } from 'vitest';
import type { EditorLogEvent, LayoutChangeEvent } from '../src/editor/editorTypes';
import { LadderEditor } from '../src/editor/ladderEditor';
import { createInstruction } from '../src/ladder/instructions';

function createEditor(): { editor: LadderEditor; events: EditorLogEvent[] } {
  const events: EditorLogEvent[] = [];
  const editor = new LadderEditor({ logger: event => events.push(event) });
  return { editor, events };
}

describe('LadderEditor', () => {
  it('logs routine loads', () => {
    const { editor, events } = createEditor();
    const snapshot = editor.load({ rungs: [{ text: 'XIC(A)OTE(B);', comment: 'Seal-in' }] });

    expect(snapshot).toEqual({ name: 'MainRoutine', rungs: [{ number: 0, text: 'XIC(A)OTE(B);', comment: 'Seal-in' }] });
    expect(events).toEqual([{ level: 'info', scope: 'routine', message: 'Loaded routine MainRoutine with 1 rung(s).' }]);
  });

  it('keeps the previous routine when a load fails', () => {
    const { editor, events } = createEditor();
    editor.load({ name: 'Conveyor', rungs: [{ text: 'XIC(A)OTE(B);' }] });

    expect(() => editor.load({ rungs: [{ text: 'XIC(A' }] })).toThrow("Cannot parse rung text 'XIC(A'");
    expect(editor.snapshot().name).toBe('Conveyor');
    expect(events[1]).toMatchObject({ level: 'error', scope: 'routine' });
  });

  it('logs each edit with the rungs it re-laid out', () => {
    const { editor, events } = createEditor();
    editor.load({ rungs: [{ text: 'XIC(A)OTE(B);' }, { text: 'XIC(C)OTE(D);' }] });
    events.length = 0;

    editor.insertInstruction(0, 1, {}, createInstruction('XIO', ['C']));

    expect(events).toEqual([
      {
        level: 'info',
        scope: 'editor',
        message: 'insertInstruction re-laid out 1 rung(s).',
        details: { rungNumber: 0, position: 1, branchId: undefined, rungs: [0] }
      }
    ]);
  });

  it('logs recoverable failures as warnings and others as errors', () => {
    const { editor, events } = createEditor();
    editor.load({ rungs: [{ text: '[XIC(A),]OTE(B);' }] });
    events.length = 0;

    expect(() => editor.insertInstruction(0, 2, {}, createInstruction('XIO', ['C']))).toThrow();
    expect(() => editor.insertInstruction(0, 9, {}, createInstruction('XIO', ['C']))).toThrow();

    expect(events.map(event => [event.level, event.details?.code])).toEqual([
      ['warn', 'InvalidInsertionPoint'],
      ['error', 'PositionOutOfRange']
    ]);
    expect(events[0].message).toBe('insertInstruction failed: Position 2 is on rail 0, not the main rail.');
  });

  it('notifies layout listeners until they are disposed', () => {
    const { editor } = createEditor();
    const changes: LayoutChangeEvent[] = [];
    const subscription = editor.onLayout(event => changes.push(event));

    editor.load({ rungs: [{ text: 'XIC(A)OTE(B);' }] });
    editor.setComment(0, 'first\nsecond');
    subscription.dispose();
    editor.setComment(0, undefined);

    expect(changes).toEqual([
      { rungNumbers: [0], extent: { rungCount: 1, width: 640, height: 150 } },
      { rungNumbers: [0], extent: { rungCount: 1, width: 640, height: 180 } }
    ]);
  });

  it('places instructions from canvas coordinates', () => {
    const { editor } = createEditor();
    editor.load({ rungs: [{ text: 'XIC(A)[XIC(B),]OTE(D);' }] });

    const placed = editor.insertInstructionAtPoint(150, 190, createInstruction('XIO', ['C']));

    expect(placed.rungNumber).toBe(0);
    expect(placed.element).toMatchObject({ position: 4, railId: 1 });
    expect(editor.snapshot().rungs[0].text).toBe('XIC(A)[XIC(B),XIO(C)]OTE(D);');
  });

  it('derives wires for a rung', () => {
    const { editor } = createEditor();
    editor.load({ rungs: [{ text: 'XIC(A)OTE(B);' }] });

    expect(editor.getWires(0)).toHaveLength(5);
  });

  it('adds and removes rungs through the editor', () => {
    const { editor } = createEditor();
    editor.load({ rungs: [{ text: 'XIC(A)OTE(B);' }] });

    expect(editor.addRung({ text: 'XIC(C)OTE(D);' })).toBe(1);
    expect(editor.getLayout(1).y).toBe(150);
    editor.removeRung(0);
    expect(editor.snapshot().rungs).toEqual([{ number: 0, text: 'XIC(C)OTE(D);' }]);
    expect(editor.getLayout(0).y).toBe(50);
  });
});
