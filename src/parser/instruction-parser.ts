import type { BinaryOperator, Operator, Step, UnaryOperator } from '../types/index.js';
import { AmbiguousOperandError, UnsupportedInstructionError } from '../exception/errors.js';
import { CHAIN_CONNECTIVES, OPERATOR_KEYWORDS, REVERSING_PREPOSITION } from './lexicon.js';
import { extractNumbers, tokenize } from './number-words.js';
import type { NumberToken } from './number-words.js';

interface OperatorMatch {
  operator: Operator;
  keyword: string;
  index: number;
}

const UNARY_OPERATORS: readonly Operator[] = ['square', 'sqrt'];

const CONNECTIVE_PATTERN = new RegExp(
  CHAIN_CONNECTIVES.map((c) => `${/^\w/.test(c) ? '\\b' : ''}${toPattern(c)}\\b`).join('|'),
  'g',
);

const KEYWORD_PATTERNS = OPERATOR_KEYWORDS.map((entry) => ({
  ...entry,
  pattern: new RegExp(`\\b${toPattern(entry.keyword)}\\b`, 'g'),
}));

export function isUnaryOperator(operator: Operator): operator is UnaryOperator {
  return UNARY_OPERATORS.includes(operator);
}

/**
 * Turns an instruction such as "Add 2 and 3 and then find the square of the
 * result" into an ordered chain of steps. The first step is always binary
 * with both operands; later steps either apply a unary function or a binary
 * operator to the running result.
 */
export function parseInstruction(text: string): Step[] {
  const normalized = text.toLowerCase().replace(/\s+/g, ' ').trim();
  if (!normalized) {
    throw new UnsupportedInstructionError('Instruction is empty', text);
  }

  const clauses = splitClauses(normalized);
  if (clauses.length === 0) {
    throw new UnsupportedInstructionError('Instruction has no clauses', text);
  }

  return clauses.map((clause, index) => parseClause(clause, index));
}

export function splitClauses(normalized: string): string[] {
  return normalized
    .split(CONNECTIVE_PATTERN)
    .map((clause) => clause.trim())
    .filter((clause) => clause.length > 0);
}

export function findOperator(clause: string): OperatorMatch | null {
  let best: OperatorMatch | null = null;

  for (const entry of KEYWORD_PATTERNS) {
    entry.pattern.lastIndex = 0;
    const match = entry.pattern.exec(clause);
    if (!match) continue;

    const candidate: OperatorMatch = { operator: entry.operator, keyword: entry.keyword, index: match.index };
    if (
      best === null ||
      candidate.index < best.index ||
      (candidate.index === best.index && candidate.keyword.length > best.keyword.length)
    ) {
      best = candidate;
    }
  }

  return best;
}

function parseClause(clause: string, index: number): Step {
  const match = findOperator(clause);
  if (!match) {
    throw new UnsupportedInstructionError(`No supported operation found in "${clause}"`, clause);
  }

  const tokens = tokenize(clause);
  const numbers = extractNumbers(tokens);
  const { operator } = match;

  if (isUnaryOperator(operator)) {
    if (index === 0) {
      throw new AmbiguousOperandError(
        `"${match.keyword}" needs a prior result but starts the instruction`,
        clause,
        operator,
      );
    }
    if (numbers.length > 0) {
      throw new AmbiguousOperandError(
        `"${match.keyword}" applies to the previous result and takes no operands`,
        clause,
        operator,
      );
    }
    return { operator };
  }

  return buildBinaryStep(operator, clause, tokens, numbers, index === 0);
}

function buildBinaryStep(
  operator: BinaryOperator,
  clause: string,
  tokens: readonly string[],
  numbers: NumberToken[],
  first: boolean,
): Step {
  if (numbers.length > 2) {
    throw new AmbiguousOperandError(
      `Expected at most two operands for ${operator}, found ${numbers.length}`,
      clause,
      operator,
    );
  }

  if (numbers.length === 2) {
    const [left, right] = numbers;
    if (operator === 'subtract' && isReversed(tokens, left, right)) {
      return { operator, operandA: right.value, operandB: left.value };
    }
    return { operator, operandA: left.value, operandB: right.value };
  }

  if (numbers.length === 1 && !first) {
    return { operator, operandB: numbers[0].value };
  }

  throw new AmbiguousOperandError(
    first
      ? `${operator} needs two operands to start the instruction`
      : `${operator} needs an operand to apply to the previous result`,
    clause,
    operator,
  );
}

function isReversed(tokens: readonly string[], left: NumberToken, right: NumberToken): boolean {
  for (let i = left.position + 1; i < right.position; i++) {
    if (tokens[i] === REVERSING_PREPOSITION) return true;
  }
  return false;
}

function toPattern(phrase: string): string {
  return phrase
    .split(' ')
    .map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('\\s*');
}
