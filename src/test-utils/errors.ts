/**
 * Runs `fn` and returns what it threw.
 *
 * @throws When `fn` returns normally.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw.');
}
