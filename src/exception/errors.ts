import type { ErrorCode } from '../types/index.js';

export class CalculatorError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'CalculatorError';
  }
}

export class UnsupportedInstructionError extends CalculatorError {
  constructor(message: string, public readonly clause: string) {
    super(message, 'UnsupportedInstruction', { clause });
    this.name = 'UnsupportedInstructionError';
  }
}

export class NumberParseError extends CalculatorError {
  constructor(message: string, public readonly token: string) {
    super(message, 'NumberParse', { token });
    this.name = 'NumberParseError';
  }
}

export class AmbiguousOperandError extends CalculatorError {
  constructor(
    message: string,
    public readonly clause: string,
    public readonly operator: string,
  ) {
    super(message, 'AmbiguousOperand', { clause, operator });
    this.name = 'AmbiguousOperandError';
  }
}

export type ButtonNotFoundReason = 'missing' | 'ambiguous' | 'unknown_name';

export class ButtonNotFoundError extends CalculatorError {
  constructor(
    message: string,
    public readonly symbol: string,
    public readonly reason: ButtonNotFoundReason,
    public readonly candidates: string[] = [],
  ) {
    super(message, 'ButtonNotFound', { symbol, reason, candidates });
    this.name = 'ButtonNotFoundError';
  }
}

export class RegistryFormatError extends CalculatorError {
  constructor(message: string, public readonly source: string) {
    super(message, 'RegistryFormat', { source });
    this.name = 'RegistryFormatError';
  }
}

export class WindowUnavailableError extends CalculatorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'WindowUnavailable', context);
    this.name = 'WindowUnavailableError';
  }
}

export class ClickError extends CalculatorError {
  constructor(
    message: string,
    public readonly index: number,
    public readonly symbol: string,
    public readonly x: number,
    public readonly y: number,
  ) {
    super(message, 'ClickFailed', { index, symbol, x, y });
    this.name = 'ClickError';
  }
}

export class MalformedStepError extends CalculatorError {
  constructor(message: string, public readonly stepIndex: number) {
    super(message, 'MalformedStep', { stepIndex });
    this.name = 'MalformedStepError';
  }
}
