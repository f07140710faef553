/**
 * Transform registry.
 *
 * Transform nodes name a function from this registry. Functions must be
 * side-effect free: a retried or replayed run calls them again with the
 * same inputs and expects the same value back.
 */

import { createTypedError, FatalNodeError } from '../domain/errors';

/** Extra information available to a transform function. */
export interface TransformInvocation {
  /** Every resolved input, keyed by slot. */
  inputs: Record<string, unknown>;
}

export type TransformFunction = (
  input: unknown,
  args: Record<string, unknown>,
  invocation: TransformInvocation,
) => unknown | Promise<unknown>;

export class TransformRegistry {
  private readonly functions = new Map<string, TransformFunction>();

  register(name: string, fn: TransformFunction): this {
    this.functions.set(name, fn);
    return this;
  }

  get(name: string): TransformFunction | undefined {
    return this.functions.get(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  names(): string[] {
    return [...this.functions.keys()];
  }
}

function badArgument(fn: string, message: string): FatalNodeError {
  return new FatalNodeError(
    createTypedError({ code: 'NODE.TRANSFORM_FAILED', message: `${fn}: ${message}` }),
  );
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function toNumber(fn: string, value: unknown): number {
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) throw badArgument(fn, `expected a number, got ${JSON.stringify(value)}`);
  return n;
}

/** Read a dotted path ("a.b.0.c") from a value. */
export function readPath(value: unknown, path: string): unknown {
  let current: unknown = value;
  for (const segment of path.split('.')) {
    if (segment === '') continue;
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

/** Replace `{{name}}` / `{{a.b}}` placeholders from a scope. Unknown names render empty. */
export function renderTemplate(template: string, scope: Record<string, unknown>): string {
  return template.replace(/\{\{\s*([\w.$-]+)\s*\}\}/g, (_match, name: string) => asText(readPath(scope, name)));
}

/** Registry preloaded with the built-in transforms. */
export function createDefaultTransformRegistry(): TransformRegistry {
  return new TransformRegistry()
    .register('identity', (input) => input)
    .register('uppercase', (input) => asText(input).toUpperCase())
    .register('lowercase', (input) => asText(input).toLowerCase())
    .register('trim', (input) => asText(input).trim())
    .register('length', (input) => {
      if (typeof input === 'string' || Array.isArray(input)) return input.length;
      if (input !== null && typeof input === 'object') return Object.keys(input).length;
      throw badArgument('length', 'input has no length');
    })
    .register('json_parse', (input) => {
      try {
        return JSON.parse(asText(input));
      } catch (err) {
        throw badArgument('json_parse', err instanceof Error ? err.message : 'invalid JSON');
      }
    })
    .register('json_stringify', (input) => JSON.stringify(input ?? null))
    .register('concat', (_input, args, { inputs }) => {
      const separator = typeof args.separator === 'string' ? args.separator : '';
      return Object.values(inputs).map(asText).join(separator);
    })
    .register('template', (input, args, { inputs }) => {
      if (typeof args.template !== 'string') throw badArgument('template', 'args.template must be a string');
      return renderTemplate(args.template, { ...inputs, input });
    })
    .register('pick', (input, args) => {
      if (typeof args.path !== 'string') throw badArgument('pick', 'args.path must be a string');
      return readPath(input, args.path);
    })
    .register('add', (input, args) => toNumber('add', input) + toNumber('add', args.amount ?? 0))
    .register('multiply', (input, args) => toNumber('multiply', input) * toNumber('multiply', args.factor ?? 1));
}
