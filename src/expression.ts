import { exhaustive } from './errors.js'

// values are 32-bit signed integers
export const INT32_MIN = -2_147_483_648
export const INT32_MAX = 2_147_483_647

// recursion limit shared by the parser and the evaluator
export const DEFAULT_MAX_DEPTH = 256

export const BinaryOperator = {
  Add: 'Add',
  Subtract: 'Subtract',
  Multiply: 'Multiply'
} as const

export type BinaryOperator = (typeof BinaryOperator)[keyof typeof BinaryOperator]

export type Expression =
  | NumberLiteral
  | VariableReference
  | Assignment
  | BinaryOp

export interface NumberLiteral {
  readonly kind: 'number'
  readonly value: number
}

export interface VariableReference {
  readonly kind: 'variable'
  readonly name: string
}

// target is only checked to be a variable when evaluated
export interface Assignment {
  readonly kind: 'assignment'
  readonly target: Expression
  readonly value: Expression
}

export interface BinaryOp {
  readonly kind: 'binary'
  readonly operator: BinaryOperator
  readonly left: Expression
  readonly right: Expression
}

// constructors

export function numberLiteral (value: number): NumberLiteral {
  return { kind: 'number', value }
}

export function variableReference (name: string): VariableReference {
  return { kind: 'variable', name }
}

export function assignment (target: Expression, value: Expression): Assignment {
  return { kind: 'assignment', target, value }
}

export function binaryOp (operator: BinaryOperator, left: Expression, right: Expression): BinaryOp {
  return { kind: 'binary', operator, left, right }
}

/**
 * Structural debug rendering, e.g.
 * `BinaryOp(Add, NumberLiteral(1), VariableReference("x"))`.
 */
export function formatExpression (expression: Expression): string {
  switch (expression.kind) {
    case 'number':
      return `NumberLiteral(${expression.value})`
    case 'variable':
      return `VariableReference(${JSON.stringify(expression.name)})`
    case 'assignment':
      return `Assignment(${formatExpression(expression.target)}, ${formatExpression(expression.value)})`
    case 'binary':
      return `BinaryOp(${expression.operator}, ${formatExpression(expression.left)}, ${formatExpression(expression.right)})`
    default:
      return exhaustive(expression)
  }
}
