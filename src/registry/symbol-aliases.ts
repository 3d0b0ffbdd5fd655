import type { ButtonSymbol } from '../types/index.js';

export interface SymbolAliases {
  /** Matched exactly (case-insensitive) against element aliases. */
  names: readonly string[];
  /** Matched as whole phrases inside an element's label text. */
  labels: readonly string[];
}

export const SYMBOL_ALIASES: Readonly<Record<ButtonSymbol, SymbolAliases>> = {
  '0': { names: ['0', 'zero'], labels: ['zero'] },
  '1': { names: ['1', 'one'], labels: ['one'] },
  '2': { names: ['2', 'two'], labels: ['two'] },
  '3': { names: ['3', 'three'], labels: ['three'] },
  '4': { names: ['4', 'four'], labels: ['four'] },
  '5': { names: ['5', 'five'], labels: ['five'] },
  '6': { names: ['6', 'six'], labels: ['six'] },
  '7': { names: ['7', 'seven'], labels: ['seven'] },
  '8': { names: ['8', 'eight'], labels: ['eight'] },
  '9': { names: ['9', 'nine'], labels: ['nine'] },
  '+': { names: ['+', 'plus', 'add'], labels: ['addition'] },
  '-': { names: ['-', '−', 'minus', 'subtract'], labels: ['subtraction'] },
  '×': { names: ['×', '*', 'multiply', 'times'], labels: ['multiplication'] },
  '÷': { names: ['÷', '/', 'divide'], labels: ['division'] },
  '=': { names: ['=', 'equals', 'equal'], labels: ['equals'] },
  square: { names: ['square', 'x²', 'x^2', 'sqr'], labels: ['squared', 'square of'] },
  sqrt: { names: ['sqrt', '√', '√x', 'square root'], labels: ['square root'] },
};

export const BUTTON_SYMBOLS: readonly ButtonSymbol[] = [
  '0', '1', '2', '3', '4', '5', '6', '7', '8', '9',
  '+', '-', '×', '÷', '=',
  'square', 'sqrt',
];
