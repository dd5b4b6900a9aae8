declare module 'jexl' {
  type ExpressionFunction = (...args: unknown[]) => unknown

  class Jexl {
    eval(expression: string, context?: Record<string, unknown>): Promise<unknown>
    evalSync(expression: string, context?: Record<string, unknown>): unknown
    addFunction(name: string, fn: ExpressionFunction): void
  }

  const jexlModule: {Jexl: typeof Jexl; expr: Jexl}
  export default jexlModule
}
