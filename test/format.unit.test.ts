import { describe, it } from 'node:test'
import assert from 'node:assert'
import { Chalk } from 'chalk'
import { formatError, formatResult } from '../src/format.js'
import { interpret } from '../src/session.js'
import { Environment } from '../src/environment.js'
import { EvalError, LexError } from '../src/errors.js'

const plain = new Chalk({ level: 0 })

describe('formatResult', () => {
  it('should print tokens, tree and value', () => {
    const result = interpret('x = 5', new Environment())

    assert.deepStrictEqual(formatResult(result, plain), [
      'tokens: [Identifier("x"), Assign, Number("5")]',
      'parsed: Assignment(VariableReference("x"), NumberLiteral(5))',
      '5'
    ])
  })
})

describe('formatError', () => {
  it('should point at the offending character', () => {
    const error = new LexError('@', 4)

    assert.deepStrictEqual(formatError(error, '1 + @', plain), [
      '1 + @',
      '    ^',
      'LexError: Couldn\'t parse "@" to a token'
    ])
  })

  it('should print only the message when there is no position', () => {
    const error = EvalError.unboundVariable('y')

    assert.deepStrictEqual(formatError(error, 'y', plain), [
      'EvalError: Unbound variable "y"'
    ])
  })

  it('should colour the output when colours are enabled', () => {
    const red = new Chalk({ level: 1 })
    const [line] = formatError(EvalError.unboundVariable('y'), 'y', red)

    assert.strictEqual(line, '\u001B[31mEvalError: Unbound variable "y"\u001B[39m')
  })
})
