import { createToken, Lexer } from 'chevrotain';

const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /[ \t\r\n]+/,
  group: Lexer.SKIPPED
});

export const Mnemonic = createToken({ name: 'Mnemonic', pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

// Rung structure
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/ });
export const RBracket = createToken({ name: 'RBracket', pattern: /\]/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });
export const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });

// Operand lists. Parentheses nest so expressions like CPT(Out,ABS(In1,In2)) stay in one operand.
export const LParen = createToken({ name: 'LParen', pattern: /\(/, push_mode: 'operands' });
export const RParen = createToken({ name: 'RParen', pattern: /\)/, pop_mode: true });
export const OperandSeparator = createToken({ name: 'OperandSeparator', pattern: /,/ });
export const OperandText = createToken({ name: 'OperandText', pattern: /[^(),]+/, line_breaks: true });

export const allTokens = [
  WhiteSpace,
  Mnemonic,
  LBracket,
  RBracket,
  Comma,
  Semicolon,
  LParen,
  RParen,
  OperandSeparator,
  OperandText
];

export const RungLexer = new Lexer(
  {
    modes: {
      rung: [WhiteSpace, Mnemonic, LParen, LBracket, RBracket, Comma, Semicolon],
      operands: [LParen, RParen, OperandSeparator, OperandText]
    },
    defaultMode: 'rung'
  },
  {
    positionTracking: 'onlyOffset'
  }
);
