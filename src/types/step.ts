export type BinaryOperator = 'add' | 'subtract' | 'multiply' | 'divide';
export type UnaryOperator = 'square' | 'sqrt';
export type Operator = BinaryOperator | UnaryOperator;

export interface Step {
  operator: Operator;
  /** Absent when the step applies to the running result. */
  operandA?: number;
  operandB?: number;
}
