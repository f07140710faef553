/**
 * Expression evaluation for conditional nodes and loop termination predicates.
 *
 * Expressions are plain JavaScript expressions evaluated in a fresh VM
 * context that only sees the scope handed in (resolved inputs, context view,
 * loop state). Scope values are copied in, so an expression cannot mutate
 * engine state.
 */

import vm from 'vm';

/** Error raised when an expression cannot be compiled or evaluated. */
export class ExpressionError extends Error {
  constructor(
    message: string,
    public readonly expression: string,
  ) {
    super(message);
    this.name = 'ExpressionError';
  }
}

const compiled = new Map<string, vm.Script>();

/**
 * Compile an expression, caching the script. Throws ExpressionError on a
 * syntax error.
 */
export function compileExpression(expression: string): vm.Script {
  const cached = compiled.get(expression);
  if (cached) return cached;

  try {
    const script = new vm.Script(`(${expression}\n)`, { filename: 'expression.js' });
    compiled.set(expression, script);
    return script;
  } catch (err) {
    throw new ExpressionError(
      `Invalid expression "${expression}": ${err instanceof Error ? err.message : String(err)}`,
      expression,
    );
  }
}

/** Returns the syntax error message, or undefined when the expression compiles. */
export function checkExpressionSyntax(expression: string): string | undefined {
  try {
    compileExpression(expression);
    return undefined;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/** Evaluate an expression against a scope. */
export function evaluateExpression(
  expression: string,
  scope: Record<string, unknown>,
  timeoutMs: number,
): unknown {
  const script = compileExpression(expression);
  const sandbox = vm.createContext(isolateScope(scope));
  try {
    return script.runInContext(sandbox, { timeout: timeoutMs });
  } catch (err) {
    throw new ExpressionError(
      `Expression "${expression}" failed: ${err instanceof Error ? err.message : String(err)}`,
      expression,
    );
  }
}

/** Evaluate an expression and coerce the result to a boolean. */
export function evaluatePredicate(
  expression: string,
  scope: Record<string, unknown>,
  timeoutMs: number,
): boolean {
  return Boolean(evaluateExpression(expression, scope, timeoutMs));
}

/** Identifiers usable as top-level names inside an expression. */
const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function isolateScope(scope: Record<string, unknown>): Record<string, unknown> {
  const isolated: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(scope)) {
    if (!IDENTIFIER.test(key)) continue;
    isolated[key] = value === undefined ? undefined : structuredClone(value);
  }
  return isolated;
}
