// Delimiter-separated record reader built on a retaining buffer
import { assertInRange } from '../core/errors'
import { RetainingBuffer } from '../core/types'

/**
 * Byte value of `,`
 */
export const DEFAULT_DELIMITER = 0x2c

/**
 * A record, or a piece of one, read from the stream.
 * Records too large to retain arrive as several values; all but the last have
 * `complete: false`.
 */
export interface DelimitedRecord {
  value: Uint8Array
  complete: boolean
}

/**
 * Splits incoming chunks into delimiter-separated records.
 * The unterminated tail of each chunk is kept in the buffer and joined with
 * the next chunk, so records may span any number of reads.
 */
export class DelimitedReader {
  private readonly buffer: RetainingBuffer<Uint8Array>
  private readonly delimiter: number
  private continuing = false
  private completeCount = 0
  private fragmentCount = 0

  constructor(buffer: RetainingBuffer<Uint8Array>, delimiter: number = DEFAULT_DELIMITER) {
    assertInRange('delimiter', delimiter, 0xff)
    this.buffer = buffer
    this.delimiter = delimiter
  }

  /**
   * Feed a chunk and return every record it completes
   */
  push(chunk: Uint8Array): DelimitedRecord[] {
    const results: DelimitedRecord[] = []
    let offset = 0

    while (offset < chunk.length) {
      const region = this.buffer.writableRegion()
      if (region.length === 0) {
        // Content fills storage without a boundary
        this.emitFragment(results, 0)
        continue
      }

      const count = Math.min(region.length, chunk.length - offset)
      region.set(chunk.subarray(offset, offset + count))
      this.buffer.extendLength(count)
      offset += count

      this.drain(results)
    }

    return results
  }

  /**
   * Flush the remaining content as the final record and reset the buffer
   */
  end(): DelimitedRecord[] {
    const results: DelimitedRecord[] = []
    if (!this.buffer.isEmpty() || this.continuing) {
      results.push(this.emit(this.buffer.asSlice(), true))
    }
    this.buffer.reset()
    return results
  }

  /**
   * Number of complete records emitted so far
   */
  get recordsEmitted(): number {
    return this.completeCount
  }

  /**
   * Number of incomplete pieces emitted so far
   */
  get fragmentsEmitted(): number {
    return this.fragmentCount
  }

  private drain(results: DelimitedRecord[]): void {
    const content = this.buffer.asSlice()
    let start = 0
    let boundary = content.indexOf(this.delimiter, start)

    while (boundary !== -1) {
      results.push(this.emit(content.subarray(start, boundary), true))
      start = boundary + 1
      boundary = content.indexOf(this.delimiter, start)
    }

    const tail = content.length - start
    if (tail > this.buffer.retentionCapacity || tail >= this.buffer.capacity) {
      this.emitFragment(results, start)
      return
    }
    this.buffer.retainFrom(start)
  }

  private emitFragment(results: DelimitedRecord[], start: number): void {
    const content = this.buffer.asSlice()
    results.push(this.emit(content.subarray(start), false))
    this.buffer.retainFrom(content.length)
  }

  private emit(view: Uint8Array, complete: boolean): DelimitedRecord {
    if (complete) {
      this.completeCount++
    } else {
      this.fragmentCount++
    }
    this.continuing = !complete
    return { value: new Uint8Array(view), complete }
  }
}
