import type { CstNode, IToken } from 'chevrotain';
import { LadderError } from '../../errors';
import type { BranchId, InstructionRef, RungElement, RungElementDraft } from '../../types';
import { createInstruction } from '../instructions';
import { RungTextParser } from './parser';
import { RungLexer } from './tokens';

export type RungTextNode =
  | { type: 'instruction'; instruction: InstructionRef }
  | { type: 'branch'; rails: RungTextNode[][] };

export interface ParseDiagnostic {
  message: string;
  startOffset?: number;
  endOffset?: number;
}

export interface RungTextParseResult {
  nodes?: RungTextNode[];
  diagnostics: ParseDiagnostic[];
}

interface RungContext {
  element?: CstNode[];
}

interface ElementContext {
  instruction?: CstNode[];
  branch?: CstNode[];
}

interface InstructionContext {
  Mnemonic: IToken[];
  operandList: CstNode[];
}

interface OperandListContext {
  operand: CstNode[];
}

interface OperandContext {
  OperandText?: IToken[];
  group?: CstNode[];
}

interface GroupContext {
  LParen: IToken[];
  RParen: IToken[];
  OperandText?: IToken[];
  OperandSeparator?: IToken[];
  group?: CstNode[];
}

interface BranchContext {
  rail: CstNode[];
}

interface RailContext {
  element?: CstNode[];
}

const parser = new RungTextParser();
const BaseVisitor = parser.getBaseCstVisitorConstructor();

function byOffset(a: IToken, b: IToken): number {
  return a.startOffset - b.startOffset;
}

class RungTextBuilder extends BaseVisitor {
  constructor() {
    super();
    this.validateVisitor();
  }

  rung(ctx: RungContext): RungTextNode[] {
    return (ctx.element ?? []).map(node => this.visit(node));
  }

  element(ctx: ElementContext): RungTextNode {
    if (ctx.instruction) {
      return this.visit(ctx.instruction[0]);
    }
    return this.visit(ctx.branch ?? []);
  }

  instruction(ctx: InstructionContext): RungTextNode {
    const operands: string[] = this.visit(ctx.operandList[0]);
    // MNEMONIC() carries no operands rather than one empty one.
    const cleaned = operands.length === 1 && operands[0] === '' ? [] : operands;
    return { type: 'instruction', instruction: createInstruction(ctx.Mnemonic[0].image, cleaned) };
  }

  operandList(ctx: OperandListContext): string[] {
    return ctx.operand.map(node => this.visit(node));
  }

  operand(ctx: OperandContext): string {
    const groups: IToken[][] = (ctx.group ?? []).map(node => this.visit(node));
    const tokens = [...(ctx.OperandText ?? []), ...groups.flat()].sort(byOffset);
    return tokens
      .map(token => token.image)
      .join('')
      .trim();
  }

  group(ctx: GroupContext): IToken[] {
    const nested: IToken[][] = (ctx.group ?? []).map(node => this.visit(node));
    return [
      ...ctx.LParen,
      ...ctx.RParen,
      ...(ctx.OperandText ?? []),
      ...(ctx.OperandSeparator ?? []),
      ...nested.flat()
    ].sort(byOffset);
  }

  branch(ctx: BranchContext): RungTextNode {
    return { type: 'branch', rails: ctx.rail.map(node => this.visit(node)) };
  }

  rail(ctx: RailContext): RungTextNode[] {
    return (ctx.element ?? []).map(node => this.visit(node));
  }
}

const builder = new RungTextBuilder();

export function parseRungText(text: string): RungTextParseResult {
  const lexResult = RungLexer.tokenize(text);
  parser.input = lexResult.tokens;
  const cst = parser.rung();

  const diagnostics: ParseDiagnostic[] = [];
  lexResult.errors.forEach(error =>
    diagnostics.push({
      message: error.message,
      startOffset: error.offset,
      endOffset: error.offset + error.length
    })
  );
  parser.errors.forEach(error =>
    diagnostics.push({
      message: error.message,
      startOffset: error.token.startOffset,
      endOffset: error.token.endOffset
    })
  );

  if (diagnostics.length > 0) {
    return { diagnostics };
  }
  const nodes: RungTextNode[] = builder.visit(cst);
  return { nodes, diagnostics };
}

function requireNodes(text: string): RungTextNode[] {
  const result = parseRungText(text);
  if (!result.nodes) {
    const first = result.diagnostics[0];
    throw new LadderError('InvalidRungText', `Cannot parse rung text '${text}': ${first?.message ?? 'unknown error'}`, {
      diagnostics: result.diagnostics
    });
  }
  return result.nodes;
}

/**
 * Flattens parsed rung text into element drafts. Each `[` gets a fresh branch id for its
 * first rail and every `,` inside it a fresh id for the sibling rail it opens.
 */
export function toElementDrafts(nodes: readonly RungTextNode[], allocate: () => BranchId): RungElementDraft[] {
  const drafts: RungElementDraft[] = [];
  const walk = (list: readonly RungTextNode[]): void => {
    for (const node of list) {
      if (node.type === 'instruction') {
        drafts.push({ kind: 'instruction', instruction: node.instruction });
        continue;
      }
      const branchId = allocate();
      drafts.push({ kind: 'branchStart', branchId });
      node.rails.forEach((rail, index) => {
        if (index > 0) {
          drafts.push({ kind: 'branchNext', branchId: allocate() });
        }
        walk(rail);
      });
      drafts.push({ kind: 'branchEnd', branchId });
    }
  };
  walk(nodes);
  return drafts;
}

export function parseRungElements(text: string, allocate: () => BranchId): RungElementDraft[] {
  return toElementDrafts(requireNodes(text), allocate);
}

export function parseInstructionText(text: string): InstructionRef {
  const nodes = requireNodes(text);
  const [node] = nodes;
  if (nodes.length !== 1 || node.type !== 'instruction') {
    throw new LadderError('InvalidRungText', `Expected a single instruction, got '${text}'.`);
  }
  return node.instruction;
}

export function formatRungText(elements: readonly RungElement[]): string {
  const parts = elements.map(element => {
    switch (element.kind) {
      case 'instruction':
        return element.instruction.text;
      case 'branchStart':
        return '[';
      case 'branchNext':
        return ',';
      case 'branchEnd':
        return ']';
    }
  });
  return `${parts.join('')};`;
}
