// Shared type definitions for retaining buffers
// Both buffer variants implement RetainingBuffer

/**
 * Fixed-length numeric storage the buffers operate on.
 * Every numeric typed array (Uint8Array, Int16Array, Float64Array, ...) satisfies it.
 */
export interface ElementStorage<T> {
  readonly length: number
  [index: number]: number
  subarray(begin?: number, end?: number): T
  copyWithin(target: number, start: number, end?: number): unknown
  fill(value: number, start?: number, end?: number): unknown
}

/**
 * Allocates zeroed storage of the given length, e.g. `Uint8Array`
 */
export type ElementArrayConstructor<T> = new (length: number) => T

/**
 * How retained elements are kept between fills
 */
export type RetentionStrategy = 'rotate' | 'overflow'

/**
 * Contract shared by both buffer variants.
 *
 * A consumer loop writes into `writableRegion()`, reports the count with
 * `extendLength()`, scans `asSlice()` for record boundaries and hands the
 * first unconsumed index to `retainFrom()`.
 */
export interface RetainingBuffer<T extends ElementStorage<T>> {
  readonly strategy: RetentionStrategy
  /** Total number of elements in storage */
  readonly capacity: number
  /** Number of leading elements that are valid content */
  readonly length: number
  /** Elements carried over from the previous cycle */
  readonly retainedLength: number
  /** Largest tail `retainFrom` accepts */
  readonly retentionCapacity: number

  isEmpty(): boolean
  writableRegion(): T
  asSlice(): T
  extendLength(count: number): number
  retainFrom(index: number): void
  reset(): void
}
