import type { Environment } from './environment.js'
import { ErrorCodes, EvalError, exhaustive } from './errors.js'
import {
  DEFAULT_MAX_DEPTH,
  INT32_MAX,
  INT32_MIN,
  formatExpression,
  type Assignment,
  type BinaryOp,
  type BinaryOperator,
  type Expression
} from './expression.js'

export interface EvalOptions {
  maxDepth?: number
}

interface EvalContext {
  readonly environment: Environment
  readonly maxDepth: number
  depth: number
}

const SYMBOLS: Record<BinaryOperator, string> = {
  Add: '+',
  Subtract: '-',
  Multiply: '*'
}

function combine (operator: BinaryOperator, left: number, right: number): number {
  switch (operator) {
    case 'Add':
      return left + right
    case 'Subtract':
      return left - right
    case 'Multiply':
      return left * right
    default:
      return exhaustive(operator)
  }
}

function evaluateBinary (expression: BinaryOp, context: EvalContext): number {
  const left = evaluateNode(expression.left, context)
  const right = evaluateNode(expression.right, context)

  const result = combine(expression.operator, left, right)

  // int32 operands: a rounded product never crosses the int32 bounds
  if (result < INT32_MIN || result > INT32_MAX) {
    throw new EvalError(
      ErrorCodes.Overflow,
      `${left} ${SYMBOLS[expression.operator]} ${right} overflows a 32-bit integer`
    )
  }

  // (0 - 5) * 0 is -0 in IEEE arithmetic
  return result + 0
}

function evaluateNode (expression: Expression, context: EvalContext): number {
  switch (expression.kind) {
    case 'number':
      return expression.value

    case 'variable':
      return context.environment.lookup(expression.name)

    case 'assignment':
    case 'binary': {
      const composite = expression

      return enter(context, () => evaluateComposite(composite, context))
    }

    default:
      return exhaustive(expression)
  }
}

// only nodes with children count towards the depth, so every tree the parser
// accepts at a given limit also evaluates at that limit
function enter (context: EvalContext, evaluateChildren: () => number): number {
  if (context.depth >= context.maxDepth) {
    throw new EvalError(
      ErrorCodes.DepthExceeded,
      `Expression is nested deeper than ${context.maxDepth} levels`
    )
  }

  context.depth++

  try {
    return evaluateChildren()
  } finally {
    context.depth--
  }
}

function evaluateComposite (expression: Assignment | BinaryOp, context: EvalContext): number {
  if (expression.kind === 'binary') return evaluateBinary(expression, context)

  const { target } = expression

  const value = evaluateNode(expression.value, context)

  if (target.kind !== 'variable') {
    throw new EvalError(
      ErrorCodes.MalformedAssignment,
      `Cannot assign to ${formatExpression(target)}: ${formatExpression(expression)}`
    )
  }

  context.environment.assign(target.name, value)

  return context.environment.lookup(target.name)
}

/**
 * Evaluates a tree against `environment`. Only assignments write to it, and
 * an assignment that finished before a later failure stays in place.
 */
export function evaluate (expression: Expression, environment: Environment, options: EvalOptions = {}): number {
  return evaluateNode(expression, {
    environment,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    depth: 0
  })
}
