import type { InstructionCategory, InstructionRef } from '../types';

const CONTACT_MNEMONICS: ReadonlySet<string> = new Set(['XIC', 'XIO', 'ONS', 'OSR', 'OSF']);
const COIL_MNEMONICS: ReadonlySet<string> = new Set(['OTE', 'OTL', 'OTU']);

export function categorizeMnemonic(mnemonic: string): InstructionCategory {
  const upper = mnemonic.toUpperCase();
  if (CONTACT_MNEMONICS.has(upper)) {
    return 'contact';
  }
  if (COIL_MNEMONICS.has(upper)) {
    return 'coil';
  }
  return 'block';
}

export function formatInstruction(mnemonic: string, operands: readonly string[]): string {
  return `${mnemonic}(${operands.join(',')})`;
}

export function createInstruction(mnemonic: string, operands: readonly string[] = []): InstructionRef {
  const normalized = mnemonic.trim().toUpperCase();
  const cleaned = operands.map(operand => operand.trim());
  return {
    mnemonic: normalized,
    operands: cleaned,
    text: formatInstruction(normalized, cleaned),
    category: categorizeMnemonic(normalized)
  };
}

// Placeholders used when a tool mode drops a fresh instruction onto a rung.
export const DEFAULT_INSTRUCTIONS: Readonly<Record<InstructionCategory, InstructionRef>> = {
  contact: createInstruction('XIC', ['NewContact']),
  coil: createInstruction('OTE', ['NewCoil']),
  block: createInstruction('TON', ['Timer1', '1000', '0'])
};
