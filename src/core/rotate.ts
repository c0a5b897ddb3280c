// In-place rotation primitives
import { ElementStorage } from './types'

/**
 * Reverse the elements in [start, end) in place
 */
export function reverseRange<T extends ElementStorage<T>>(data: T, start: number, end: number): void {
  for (let i = start, j = end - 1; i < j; i++, j--) {
    const tmp = data[i]
    data[i] = data[j]
    data[j] = tmp
  }
}

/**
 * Rotate the first `length` elements right by `k` positions in place.
 * The last k elements end up at the front in their original order.
 * Three reversals: O(length) time, no extra storage.
 */
export function rotateRight<T extends ElementStorage<T>>(data: T, length: number, k: number): void {
  if (length === 0) {
    return
  }
  const shift = k % length
  if (shift === 0) {
    return
  }
  reverseRange(data, 0, length)
  reverseRange(data, 0, shift)
  reverseRange(data, shift, length)
}
