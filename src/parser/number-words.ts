import { NumberParseError } from '../exception/errors.js';
import { TENS_WORDS, UNIT_WORDS, UNSUPPORTED_NUMERAL_WORDS } from './lexicon.js';

export interface NumberToken {
  value: number;
  /** Index of the numeral's first token within the clause tokens. */
  position: number;
  text: string;
}

const TOKEN_PATTERN = /-?\d+(?:,\d{3})*(?:\.\d+)?|[a-z]+/g;

export function tokenize(clause: string): string[] {
  return clause.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Pulls integer operands out of clause tokens. Accepts digit runs
 * ("25", "1,200"), unit words up to "nineteen", tens words and
 * tens+unit pairs ("twenty five", "twenty-five").
 */
export function extractNumbers(tokens: readonly string[]): NumberToken[] {
  const numbers: NumberToken[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (/^-?\d/.test(token)) {
      numbers.push({ value: parseDigitRun(token), position: i, text: token });
      continue;
    }

    if (isUnsupportedNumeral(token)) {
      throw new NumberParseError(`Unsupported numeral word "${token}"`, token);
    }

    const next: string | undefined = tokens[i + 1];
    const tens = lookup(TENS_WORDS, token);
    const unit = lookup(UNIT_WORDS, token);

    if (tens !== undefined) {
      const nextUnit = next === undefined ? undefined : lookup(UNIT_WORDS, next);
      if (nextUnit !== undefined && nextUnit >= 1 && nextUnit <= 9) {
        numbers.push({ value: tens + nextUnit, position: i, text: `${token} ${next}` });
        i++;
        continue;
      }
      if (next !== undefined && isNumeralWord(next)) {
        throw new NumberParseError(`Cannot compose "${token} ${next}"`, `${token} ${next}`);
      }
      numbers.push({ value: tens, position: i, text: token });
      continue;
    }

    if (unit !== undefined) {
      if (next !== undefined && isNumeralWord(next)) {
        throw new NumberParseError(`Cannot compose "${token} ${next}"`, `${token} ${next}`);
      }
      numbers.push({ value: unit, position: i, text: token });
    }
  }

  return numbers;
}

function lookup(table: Readonly<Record<string, number>>, word: string): number | undefined {
  return Object.hasOwn(table, word) ? table[word] : undefined;
}

function isUnsupportedNumeral(word: string): boolean {
  return UNSUPPORTED_NUMERAL_WORDS.includes(word);
}

function isNumeralWord(word: string): boolean {
  return (
    lookup(UNIT_WORDS, word) !== undefined ||
    lookup(TENS_WORDS, word) !== undefined ||
    isUnsupportedNumeral(word)
  );
}

function parseDigitRun(token: string): number {
  if (token.startsWith('-')) {
    throw new NumberParseError(`Negative operands are not supported: "${token}"`, token);
  }
  if (token.includes('.')) {
    throw new NumberParseError(`Only integer operands are supported: "${token}"`, token);
  }

  const value = Number(token.replace(/,/g, ''));
  if (!Number.isSafeInteger(value)) {
    throw new NumberParseError(`Operand out of range: "${token}"`, token);
  }
  return value;
}
