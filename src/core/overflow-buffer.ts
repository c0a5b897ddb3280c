// Overflow-region buffer - retained tail lives in a reserved prefix of storage
import { CapacityExceededError, RetentionOverflowError, assertInRange } from './errors'
import { ElementArrayConstructor, ElementStorage, RetainingBuffer } from './types'

/**
 * Fixed-capacity buffer with a separate overflow region.
 *
 * Storage holds `primaryCapacity + overflowCapacity` elements. A retained tail
 * is moved into the first `overflowCapacity` elements, and the write region
 * that follows it is always exactly `primaryCapacity` long, so every fill can
 * request the same read size.
 *
 * Unlike RotatingBuffer, `setLength` counts from the end of the retained tail.
 */
export class OverflowBuffer<T extends ElementStorage<T>> implements RetainingBuffer<T> {
  readonly strategy = 'overflow'
  readonly primaryCapacity: number
  readonly overflowCapacity: number
  private readonly storage: T
  private innerLength = 0
  private overflowLength = 0

  constructor(primaryCapacity: number, overflowCapacity: number, elements: ElementArrayConstructor<T>) {
    assertInRange('primaryCapacity', primaryCapacity, Number.MAX_SAFE_INTEGER, 1)
    assertInRange('overflowCapacity', overflowCapacity, Number.MAX_SAFE_INTEGER - primaryCapacity)
    this.primaryCapacity = primaryCapacity
    this.overflowCapacity = overflowCapacity
    this.storage = new elements(primaryCapacity + overflowCapacity)
  }

  get capacity(): number {
    return this.storage.length
  }

  get length(): number {
    return this.innerLength
  }

  /**
   * Number of elements held in the overflow region, 0 once a new length is set
   */
  get retainedLength(): number {
    return this.overflowLength
  }

  get retentionCapacity(): number {
    return this.overflowCapacity
  }

  isEmpty(): boolean {
    return this.innerLength === 0
  }

  /**
   * View of `primaryCapacity` elements directly after the retained tail
   */
  writableRegion(): T {
    return this.storage.subarray(this.overflowLength, this.overflowLength + this.primaryCapacity)
  }

  asSlice(): T {
    return this.storage.subarray(0, this.innerLength)
  }

  /**
   * Record that `written` elements were written into the writable region.
   * The valid length becomes the retained tail plus `written`.
   */
  setLength(written: number): void {
    assertInRange('written', written, Number.MAX_SAFE_INTEGER)
    if (written > this.primaryCapacity) {
      throw new CapacityExceededError(written, this.primaryCapacity)
    }
    this.innerLength = this.overflowLength + written
    this.overflowLength = 0
  }

  /**
   * Same as setLength, returning the new total length
   */
  extendLength(count: number): number {
    this.setLength(count)
    return this.innerLength
  }

  /**
   * Keep the content from `index` onwards in the overflow region and drop the rest.
   * Storage past the retained tail is zeroed, including writes that were never reported.
   */
  overflowAt(index: number): void {
    assertInRange('index', index, this.innerLength)
    const retained = this.innerLength - index
    if (retained > this.overflowCapacity) {
      throw new RetentionOverflowError(retained, this.overflowCapacity)
    }
    this.storage.copyWithin(0, index, this.innerLength)
    this.storage.fill(0, retained)
    this.overflowLength = retained
    this.innerLength = retained
  }

  retainFrom(index: number): void {
    this.overflowAt(index)
  }

  reset(): void {
    this.storage.fill(0)
    this.innerLength = 0
    this.overflowLength = 0
  }
}
