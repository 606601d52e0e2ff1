import { describe, it } from 'node:test'
import assert from 'node:assert'
import { interpret } from '../src/session.js'
import { Environment } from '../src/environment.js'
import { ErrorCodes, EvalError, LexError, ParseError } from '../src/errors.js'
import { formatExpression } from '../src/expression.js'
import { formatTokens } from '../src/token.js'

describe('interpret', () => {
  it('should run a line through every stage', () => {
    const result = interpret('1 + 2', new Environment())

    assert.strictEqual(formatTokens(result.tokens), '[Number("1"), Plus, Number("2")]')
    assert.strictEqual(formatExpression(result.expression), 'BinaryOp(Add, NumberLiteral(1), NumberLiteral(2))')
    assert.strictEqual(result.value, 3)
  })

  it('should keep bindings between lines', () => {
    const env = new Environment()

    assert.strictEqual(interpret('x = 3', env).value, 3)
    assert.strictEqual(interpret('x', env).value, 3)
    assert.strictEqual(interpret('x', env).value, 3)
    assert.strictEqual(env.size, 1)
  })

  it('should evaluate parenthesized operands', () => {
    assert.strictEqual(interpret('(1 + 2) * 3', new Environment()).value, 9)
  })

  it('should throw the error of the failing stage', () => {
    const env = new Environment()

    assert.throws(() => interpret('1 @ 2', env), LexError)
    assert.throws(() => interpret('1 + 2 + 3', env), ParseError)
    assert.throws(() => interpret('(1 + 2', env), ParseError)
    assert.throws(() => interpret('nope', env), EvalError)
  })

  it('should keep an earlier assignment when a later part fails', () => {
    const env = new Environment()

    assert.throws(() => interpret('1 = (x = 5)', env), (error: unknown) => {
      assert.ok(error instanceof EvalError)
      assert.strictEqual(error.code, ErrorCodes.MalformedAssignment)
      return true
    })
    assert.strictEqual(interpret('x', env).value, 5)
  })

  it('should report each stage before the next one runs', () => {
    const stages: string[] = []

    assert.throws(() => interpret('missing', new Environment(), {
      onTokens: tokens => stages.push(formatTokens(tokens)),
      onParsed: expression => stages.push(formatExpression(expression))
    }), EvalError)
    assert.deepStrictEqual(stages, ['[Identifier("missing")]', 'VariableReference("missing")'])
  })

  it('should not report stages after the one that failed', () => {
    const stages: string[] = []

    assert.throws(() => interpret('(1', new Environment(), {
      onTokens: () => stages.push('tokens'),
      onParsed: () => stages.push('parsed')
    }), ParseError)
    assert.deepStrictEqual(stages, ['tokens'])
  })

  it('should pass the depth limit to the parser', () => {
    assert.throws(() => interpret('((1))', new Environment(), { maxDepth: 2 }), (error: unknown) => {
      assert.ok(error instanceof ParseError)
      assert.strictEqual(error.code, ErrorCodes.NestingTooDeep)
      return true
    })
  })
})
