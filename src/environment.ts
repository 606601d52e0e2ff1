import { EvalError } from './errors.js'

/**
 * Variable bindings that outlive a single line. One instance per session;
 * nothing here is global, so separate sessions never see each other's names.
 */
export class Environment {
  private readonly variable = new Map<string, number>()

  public get size (): number {
    return this.variable.size
  }

  public assign (name: string, value: number): void {
    this.variable.set(name, value)
  }

  public lookup (name: string): number {
    const value = this.variable.get(name)

    if (value === undefined) {
      throw EvalError.unboundVariable(name)
    }

    return value
  }

  public has (name: string): boolean {
    return this.variable.has(name)
  }

  public entries (): IterableIterator<[string, number]> {
    return this.variable.entries()
  }
}
