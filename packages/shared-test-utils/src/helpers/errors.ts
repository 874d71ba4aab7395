/**
 * Error capture helpers
 */

/**
 * Run `fn` and return what it threw.
 *
 * Fails the test if `fn` returns normally.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}
