import type {
  BinaryOperator,
  ButtonSymbol,
  DigitSymbol,
  FunctionSymbol,
  OperatorSymbol,
  Step,
  UnaryOperator,
} from '../types/index.js';
import { MalformedStepError } from '../exception/errors.js';

export const OPERATOR_SYMBOLS: Readonly<Record<BinaryOperator, OperatorSymbol>> = {
  add: '+',
  subtract: '-',
  multiply: '×',
  divide: '÷',
};

export const FUNCTION_SYMBOLS: Readonly<Record<UnaryOperator, FunctionSymbol>> = {
  square: 'square',
  sqrt: 'sqrt',
};

const DIGITS: readonly DigitSymbol[] = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9'];

/**
 * Expands a parsed chain into literal presses. Binary steps end with "=";
 * unary functions commit immediately and act on whatever the display shows.
 */
export function compileSteps(steps: readonly Step[]): ButtonSymbol[] {
  const symbols: ButtonSymbol[] = [];

  steps.forEach((step, index) => {
    switch (step.operator) {
      case 'add':
      case 'subtract':
      case 'multiply':
      case 'divide': {
        if (step.operandB === undefined) {
          throw new MalformedStepError(`Step ${index} (${step.operator}) has no second operand`, index);
        }
        if (step.operandA === undefined && index === 0) {
          throw new MalformedStepError(`Step 0 (${step.operator}) has no first operand`, index);
        }
        if (step.operandA !== undefined) {
          symbols.push(...toDigits(step.operandA, index));
        }
        symbols.push(OPERATOR_SYMBOLS[step.operator]);
        symbols.push(...toDigits(step.operandB, index));
        symbols.push('=');
        break;
      }
      case 'square':
      case 'sqrt': {
        if (index === 0) {
          throw new MalformedStepError(`Step 0 (${step.operator}) has no prior result`, index);
        }
        if (step.operandA !== undefined || step.operandB !== undefined) {
          throw new MalformedStepError(`Step ${index} (${step.operator}) must not carry operands`, index);
        }
        symbols.push(FUNCTION_SYMBOLS[step.operator]);
        break;
      }
    }
  });

  return symbols;
}

export function toDigits(value: number, stepIndex = 0): DigitSymbol[] {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new MalformedStepError(`Operand ${value} is not a non-negative integer`, stepIndex);
  }
  return Array.from(String(value), (char) => DIGITS[Number(char)]);
}

export function describeSequence(symbols: readonly ButtonSymbol[]): string {
  return symbols.join(' → ');
}
