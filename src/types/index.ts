export type { BinaryOperator, UnaryOperator, Operator, Step } from './step.js';
export type {
  DigitSymbol,
  OperatorSymbol,
  FunctionSymbol,
  EvaluateSymbol,
  ButtonSymbol,
} from './button.js';
export type { BoundingBox, ElementDescriptor } from './element.js';
export type { WindowFrame } from './window.js';
export type { ClickTarget, ClickResult } from './click.js';
export type {
  ErrorCode,
  ErrorDisposition,
  ReportedError,
  ClickOutcome,
  ExecutionReport,
} from './report.js';
