import { CstParser } from 'chevrotain';
import {
  allTokens,
  Comma,
  LBracket,
  LParen,
  Mnemonic,
  OperandSeparator,
  OperandText,
  RBracket,
  RParen,
  Semicolon
} from './tokens';

export class RungTextParser extends CstParser {
  constructor() {
    super(allTokens, {
      nodeLocationTracking: 'onlyOffset'
    });
    this.performSelfAnalysis();
  }

  public rung = this.RULE('rung', () => {
    this.MANY(() => {
      this.SUBRULE(this.element);
    });
    this.OPTION(() => {
      this.CONSUME(Semicolon);
    });
  });

  private element = this.RULE('element', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.instruction) },
      { ALT: () => this.SUBRULE(this.branch) }
    ]);
  });

  private instruction = this.RULE('instruction', () => {
    this.CONSUME(Mnemonic);
    this.CONSUME(LParen);
    this.SUBRULE(this.operandList);
    this.CONSUME(RParen);
  });

  private operandList = this.RULE('operandList', () => {
    this.SUBRULE(this.operand);
    this.MANY(() => {
      this.CONSUME(OperandSeparator);
      this.SUBRULE2(this.operand);
    });
  });

  private operand = this.RULE('operand', () => {
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(OperandText) },
        { ALT: () => this.SUBRULE(this.group) }
      ]);
    });
  });

  private group = this.RULE('group', () => {
    this.CONSUME(LParen);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(OperandText) },
        { ALT: () => this.CONSUME(OperandSeparator) },
        { ALT: () => this.SUBRULE(this.group) }
      ]);
    });
    this.CONSUME(RParen);
  });

  private branch = this.RULE('branch', () => {
    this.CONSUME(LBracket);
    this.SUBRULE(this.rail);
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.rail);
    });
    this.CONSUME(RBracket);
  });

  private rail = this.RULE('rail', () => {
    this.MANY(() => {
      this.SUBRULE(this.element);
    });
  });
}
