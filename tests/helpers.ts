// Shared test utilities

/**
 * Integers from `start` up to and including `end`
 */
export function range(start: number, end: number): number[] {
  return Array.from({ length: end - start + 1 }, (_, i) => start + i)
}

/**
 * Run `fn` and return what it threw
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('Expected function to throw')
}

/**
 * Decode a record value as UTF-8
 */
export function text(value: Uint8Array): string {
  return Buffer.from(value).toString('utf8')
}
