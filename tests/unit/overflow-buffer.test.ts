import { describe, it, expect, beforeEach } from '@jest/globals'
import { OverflowBuffer } from '../../src/core/overflow-buffer'
import { CapacityExceededError, OutOfRangeError, RetentionOverflowError } from '../../src/core/errors'
import { range, thrownBy } from '../helpers'

describe('OverflowBuffer', () => {
  let buf: OverflowBuffer<Uint8Array>

  beforeEach(() => {
    buf = new OverflowBuffer<Uint8Array>(24, 8, Uint8Array)
  })

  describe('Initial State', () => {
    it('should allocate primary plus overflow capacity', () => {
      expect(buf.primaryCapacity).toBe(24)
      expect(buf.overflowCapacity).toBe(8)
      expect(buf.capacity).toBe(32)
      expect(buf.retentionCapacity).toBe(8)
      expect(buf.strategy).toBe('overflow')
      expect(buf.length).toBe(0)
      expect(buf.isEmpty()).toBe(true)
      expect(buf.writableRegion()).toHaveLength(24)
    })

    it('should reject invalid sizes', () => {
      expect(() => new OverflowBuffer(0, 8, Uint8Array)).toThrow(OutOfRangeError)
      expect(() => new OverflowBuffer(24, -1, Uint8Array)).toThrow(OutOfRangeError)
    })
  })

  describe('Read Cycle', () => {
    it('should move the tail into the overflow region between fills', () => {
      buf.writableRegion().set(range(0, 21))
      buf.setLength(22)
      expect(buf.length).toBe(22)

      buf.overflowAt(17)
      expect(buf.length).toBe(5)
      expect(buf.retainedLength).toBe(5)
      expect(Array.from(buf.asSlice())).toEqual([17, 18, 19, 20, 21])

      const region = buf.writableRegion()
      expect(region).toHaveLength(24)
      region.set(range(22, 45))
      buf.setLength(24)
      expect(buf.length).toBe(29)
      expect(buf.retainedLength).toBe(0)
      expect(Array.from(buf.asSlice())).toEqual(range(17, 45))

      buf.overflowAt(21)
      expect(buf.length).toBe(8)
      expect(Array.from(buf.asSlice())).toEqual(range(38, 45))
      expect(buf.writableRegion()).toHaveLength(24)
    })

    it('should fail fast when the tail exceeds the overflow region', () => {
      buf.writableRegion().set(range(1, 24))
      buf.setLength(24)

      const error = thrownBy(() => buf.overflowAt(15))
      expect(error).toBeInstanceOf(RetentionOverflowError)
      expect(error).toMatchObject({ kind: 'RetentionOverflow', retained: 9, limit: 8 })
      expect(error).toHaveProperty('message', 'Retention overflow: cannot retain 9 elements, limit is 8')
      expect(buf.length).toBe(24)
      expect(Array.from(buf.asSlice())).toEqual(range(1, 24))

      buf.overflowAt(16)
      expect(Array.from(buf.asSlice())).toEqual(range(17, 24))
    })

    it('should keep the writable region at the primary capacity', () => {
      for (const index of [20, 22, 23]) {
        buf.extendLength(24)
        buf.overflowAt(index)
        expect(buf.writableRegion()).toHaveLength(24)
      }
    })

    it('should zero the discarded content', () => {
      buf.writableRegion().set(range(1, 22))
      buf.setLength(22)
      buf.overflowAt(17)

      expect(Array.from(buf.writableRegion())).toEqual(new Array(24).fill(0))
    })

    it('should zero unreported writes past the retained tail', () => {
      const small = new OverflowBuffer(8, 4, Uint8Array)
      small.writableRegion().set(range(1, 8))
      small.setLength(3)
      small.overflowAt(1)

      expect(Array.from(small.asSlice())).toEqual([2, 3])
      expect(Array.from(small.writableRegion())).toEqual(new Array(8).fill(0))
    })

    it('should count extendLength from the end of the retained tail', () => {
      buf.extendLength(10)
      buf.overflowAt(7)
      expect(buf.extendLength(4)).toBe(7)
      expect(buf.retainedLength).toBe(0)
    })

    it('should be reachable through retainFrom', () => {
      buf.writableRegion().set([5, 6, 7])
      buf.setLength(3)
      buf.retainFrom(1)
      expect(Array.from(buf.asSlice())).toEqual([6, 7])
    })

    it('should discard everything when index equals length', () => {
      buf.setLength(12)
      buf.overflowAt(12)
      expect(buf.length).toBe(0)
      expect(buf.retainedLength).toBe(0)
    })
  })

  describe('Capacity Violations', () => {
    it('should reject a write count larger than the primary region', () => {
      buf.setLength(10)
      buf.overflowAt(6)

      const error = thrownBy(() => buf.setLength(25))
      expect(error).toBeInstanceOf(CapacityExceededError)
      expect(error).toMatchObject({ requested: 25, capacity: 24 })
      expect(buf.length).toBe(4)
      expect(buf.retainedLength).toBe(4)
    })

    it('should reject an index past the length', () => {
      buf.setLength(3)
      expect(() => buf.overflowAt(4)).toThrow(OutOfRangeError)
      expect(buf.length).toBe(3)
    })
  })

  describe('Without Overflow Region', () => {
    it('should only allow discarding all content', () => {
      const bare = new OverflowBuffer(4, 0, Uint8Array)
      expect(bare.capacity).toBe(4)
      bare.setLength(4)
      expect(() => bare.overflowAt(3)).toThrow(RetentionOverflowError)
      bare.overflowAt(4)
      expect(bare.isEmpty()).toBe(true)
    })
  })

  describe('reset', () => {
    it('should zero storage and lengths', () => {
      buf.writableRegion().set(range(1, 10))
      buf.setLength(10)
      buf.overflowAt(5)

      buf.reset()
      expect(buf.length).toBe(0)
      expect(buf.retainedLength).toBe(0)
      expect(Array.from(buf.writableRegion())).toEqual(new Array(24).fill(0))
    })
  })

  describe('Element Types', () => {
    it('should retain floating point elements', () => {
      const samples = new OverflowBuffer(3, 2, Float32Array)
      samples.writableRegion().set([0.5, 1.5, 2.5])
      samples.setLength(3)
      samples.overflowAt(1)

      expect(samples.asSlice()).toBeInstanceOf(Float32Array)
      expect(Array.from(samples.asSlice())).toEqual([1.5, 2.5])
      expect(samples.writableRegion()).toHaveLength(3)
    })
  })
})
