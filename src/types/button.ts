export type DigitSymbol = '0' | '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9';
export type OperatorSymbol = '+' | '-' | '×' | '÷';
export type FunctionSymbol = 'square' | 'sqrt';
export type EvaluateSymbol = '=';

export type ButtonSymbol = DigitSymbol | OperatorSymbol | FunctionSymbol | EvaluateSymbol;
