// In-place rotating buffer - retained tail is rotated to the front of the same storage
import { CapacityExceededError, assertInRange } from './errors'
import { rotateRight } from './rotate'
import { ElementArrayConstructor, ElementStorage, RetainingBuffer } from './types'

/**
 * Fixed-capacity buffer that keeps an unconsumed tail by rotating it to the
 * start of storage. Retained elements share capacity with new writes:
 * the writable region shrinks by the size of the tail.
 *
 * @example
 * ```typescript
 * const buf = new RotatingBuffer(4096, Uint8Array)
 * const n = copyInto(buf.writableRegion())
 * buf.extendLength(n)
 * const end = lastRecordBoundary(buf.asSlice())
 * buf.rotateAndShrinkAt(end)
 * ```
 */
export class RotatingBuffer<T extends ElementStorage<T>> implements RetainingBuffer<T> {
  readonly strategy = 'rotate'
  private readonly storage: T
  private innerLength = 0
  private rotatedLength = 0

  constructor(capacity: number, elements: ElementArrayConstructor<T>) {
    assertInRange('capacity', capacity, Number.MAX_SAFE_INTEGER, 1)
    this.storage = new elements(capacity)
  }

  get capacity(): number {
    return this.storage.length
  }

  get length(): number {
    return this.innerLength
  }

  /**
   * Length of the tail kept by the last rotation, 0 once a new length is set
   */
  get retainedLength(): number {
    return this.rotatedLength
  }

  get retentionCapacity(): number {
    return this.storage.length
  }

  isEmpty(): boolean {
    return this.innerLength === 0
  }

  /**
   * View of the unused storage after the valid content
   */
  writableRegion(): T {
    return this.storage.subarray(this.innerLength)
  }

  /**
   * View of the valid content, retained tail first
   */
  asSlice(): T {
    return this.storage.subarray(0, this.innerLength)
  }

  /**
   * Mark `count` more elements as valid after writing them into the writable region
   * @returns The new total length
   */
  extendLength(count: number): number {
    assertInRange('count', count, Number.MAX_SAFE_INTEGER)
    this.setLength(this.innerLength + count)
    return this.innerLength
  }

  /**
   * Set the valid length directly
   */
  setLength(length: number): void {
    assertInRange('length', length, Number.MAX_SAFE_INTEGER)
    if (length > this.storage.length) {
      throw new CapacityExceededError(length, this.storage.length)
    }
    this.innerLength = length
    this.rotatedLength = 0
  }

  /**
   * Discard the content before `index` and move the rest to the front of storage
   */
  rotateAndShrinkAt(index: number): void {
    assertInRange('index', index, this.innerLength)
    const retained = this.innerLength - index
    rotateRight(this.storage, this.innerLength, retained)
    this.innerLength = retained
    this.rotatedLength = retained
  }

  retainFrom(index: number): void {
    this.rotateAndShrinkAt(index)
  }

  /**
   * Zero storage and forget all content
   */
  reset(): void {
    this.storage.fill(0)
    this.innerLength = 0
    this.rotatedLength = 0
  }
}
