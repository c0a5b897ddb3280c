// Strategy selection - builds either buffer variant behind the shared interface
import { OverflowBuffer } from './overflow-buffer'
import { RotatingBuffer } from './rotating-buffer'
import { ElementArrayConstructor, ElementStorage, RetainingBuffer } from './types'

export interface RotateOptions {
  strategy: 'rotate'
  capacity: number
}

export interface OverflowOptions {
  strategy: 'overflow'
  primaryCapacity: number
  overflowCapacity: number
}

export type RetainingBufferOptions = RotateOptions | OverflowOptions

/**
 * Create a rotating buffer, byte storage unless `elements` is given
 */
export function createRotatingBuffer(capacity: number): RotatingBuffer<Uint8Array>
export function createRotatingBuffer<T extends ElementStorage<T>>(
  capacity: number,
  elements: ElementArrayConstructor<T>
): RotatingBuffer<T>
export function createRotatingBuffer<T extends ElementStorage<T>>(
  capacity: number,
  elements?: ElementArrayConstructor<T>
): RotatingBuffer<T> | RotatingBuffer<Uint8Array> {
  if (elements) {
    return new RotatingBuffer(capacity, elements)
  }
  return new RotatingBuffer<Uint8Array>(capacity, Uint8Array)
}

/**
 * Create an overflow buffer with `primaryCapacity + overflowCapacity` elements of storage
 */
export function createOverflowBuffer(primaryCapacity: number, overflowCapacity: number): OverflowBuffer<Uint8Array>
export function createOverflowBuffer<T extends ElementStorage<T>>(
  primaryCapacity: number,
  overflowCapacity: number,
  elements: ElementArrayConstructor<T>
): OverflowBuffer<T>
export function createOverflowBuffer<T extends ElementStorage<T>>(
  primaryCapacity: number,
  overflowCapacity: number,
  elements?: ElementArrayConstructor<T>
): OverflowBuffer<T> | OverflowBuffer<Uint8Array> {
  if (elements) {
    return new OverflowBuffer(primaryCapacity, overflowCapacity, elements)
  }
  return new OverflowBuffer<Uint8Array>(primaryCapacity, overflowCapacity, Uint8Array)
}

/**
 * Create a buffer for the requested retention strategy
 */
export function createRetainingBuffer(options: RetainingBufferOptions): RetainingBuffer<Uint8Array>
export function createRetainingBuffer<T extends ElementStorage<T>>(
  options: RetainingBufferOptions,
  elements: ElementArrayConstructor<T>
): RetainingBuffer<T>
export function createRetainingBuffer<T extends ElementStorage<T>>(
  options: RetainingBufferOptions,
  elements?: ElementArrayConstructor<T>
): RetainingBuffer<T> | RetainingBuffer<Uint8Array> {
  if (elements) {
    return options.strategy === 'rotate'
      ? new RotatingBuffer(options.capacity, elements)
      : new OverflowBuffer(options.primaryCapacity, options.overflowCapacity, elements)
  }
  return options.strategy === 'rotate'
    ? createRotatingBuffer(options.capacity)
    : createOverflowBuffer(options.primaryCapacity, options.overflowCapacity)
}
