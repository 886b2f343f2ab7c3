import { isRecord } from '../guards';

export type GeneratedFunction = (...args: unknown[]) => unknown;

/**
 * Evaluates generated module code in-process and returns the requested
 * exports as callable functions or plain values.
 *
 * `export` keywords are stripped; free names the code refers to (the classes
 * it constructs) are passed in through `scope`.
 */
export function evaluateGenerated(
  code: string,
  exportNames: readonly string[],
  scope: Record<string, unknown> = {}
): Record<string, unknown> {
  const body = `${code.replace(/^export /gm, '')}\nreturn { ${exportNames.join(', ')} };`;
  const factory = new Function(...Object.keys(scope), body);
  const exported: unknown = Reflect.apply(factory, undefined, Object.values(scope));

  if (!isRecord(exported)) {
    throw new Error('Generated code did not produce an exports object.');
  }
  return exported;
}

/**
 * Narrows an evaluated export to a callable.
 */
export function asFunction(value: unknown): GeneratedFunction {
  if (typeof value !== 'function') {
    throw new Error(`Expected a function, got ${typeof value}.`);
  }
  return (...args: unknown[]): unknown => Reflect.apply(value, undefined, args);
}
