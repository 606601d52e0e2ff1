import { describe, it } from 'node:test'
import assert from 'node:assert'
import {
  Environment,
  ErrorCodes,
  ParseError,
  evaluate,
  formatExpression,
  formatTokens,
  parse,
  tokenize
} from '../src/index.js'

describe('package entry point', () => {
  it('should expose the lex, parse and evaluate stages', () => {
    const env = new Environment()
    const tokens = tokenize('y = (2 * 3)')
    const expression = parse(tokens)

    assert.strictEqual(formatTokens(tokens), '[Identifier("y"), Assign, LeftParen, Number("2"), Times, Number("3"), RightParen]')
    assert.strictEqual(
      formatExpression(expression),
      'Assignment(VariableReference("y"), BinaryOp(Multiply, NumberLiteral(2), NumberLiteral(3)))'
    )
    assert.strictEqual(evaluate(expression, env), 6)
    assert.strictEqual(env.lookup('y'), 6)
  })

  it('should expose the error classes', () => {
    assert.throws(() => parse(tokenize('(')), (error: unknown) => {
      assert.ok(error instanceof ParseError)
      assert.strictEqual(error.code, ErrorCodes.UnexpectedToken)
      return true
    })
  })
})
