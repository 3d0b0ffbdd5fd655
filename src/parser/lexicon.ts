import type { Operator } from '../types/index.js';

export interface OperatorKeyword {
  keyword: string;
  operator: Operator;
}

export const OPERATOR_KEYWORDS: readonly OperatorKeyword[] = [
  { keyword: 'add', operator: 'add' },
  { keyword: 'plus', operator: 'add' },
  { keyword: 'addition', operator: 'add' },
  { keyword: 'sum', operator: 'add' },
  { keyword: 'subtract', operator: 'subtract' },
  { keyword: 'minus', operator: 'subtract' },
  { keyword: 'subtraction', operator: 'subtract' },
  { keyword: 'take away', operator: 'subtract' },
  { keyword: 'multiply', operator: 'multiply' },
  { keyword: 'multiplied by', operator: 'multiply' },
  { keyword: 'times', operator: 'multiply' },
  { keyword: 'multiplication', operator: 'multiply' },
  { keyword: 'product', operator: 'multiply' },
  { keyword: 'divide', operator: 'divide' },
  { keyword: 'divided by', operator: 'divide' },
  { keyword: 'division', operator: 'divide' },
  { keyword: 'over', operator: 'divide' },
  { keyword: 'square', operator: 'square' },
  { keyword: 'squared', operator: 'square' },
  { keyword: 'square root', operator: 'sqrt' },
  { keyword: 'sqrt', operator: 'sqrt' },
  { keyword: 'root', operator: 'sqrt' },
];

/** Longest first, so "and then" splits before "then". */
export const CHAIN_CONNECTIVES: readonly string[] = ['and then', ', then', 'then'];

/** Marks "subtract A from B", which enters B first. */
export const REVERSING_PREPOSITION = 'from';

export const UNIT_WORDS: Readonly<Record<string, number>> = {
  zero: 0,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
};

export const TENS_WORDS: Readonly<Record<string, number>> = {
  twenty: 20,
  thirty: 30,
  forty: 40,
  fifty: 50,
  sixty: 60,
  seventy: 70,
  eighty: 80,
  ninety: 90,
};

/** Numeral words past the two-word compositions the parser accepts. */
export const UNSUPPORTED_NUMERAL_WORDS: readonly string[] = [
  'hundred',
  'thousand',
  'million',
  'billion',
  'point',
  'negative',
];
