import { DEFAULT_BUFFER_CAPACITY } from "../constants.ts"

/**
 * Point-in-time view of a ring buffer. Iterating it more than once yields the
 * same items; appends made after the snapshot was taken are not visible.
 */
export interface RingSnapshot<T> extends Iterable<T> {
  readonly size: number
}

/**
 * Fixed-capacity FIFO store. Appending at capacity overwrites the oldest slot.
 */
export class RingBuffer<T> {
  public readonly capacity: number
  private readonly slots: (T | undefined)[]
  private head = 0
  private count = 0

  public constructor(capacity: number = DEFAULT_BUFFER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Ring buffer capacity must be a positive integer (got ${capacity})`)
    }
    this.capacity = capacity
    this.slots = new Array<T | undefined>(capacity)
  }

  public get size(): number {
    return this.count
  }

  public append(item: T): void {
    const tail = (this.head + this.count) % this.capacity
    this.slots[tail] = item
    if (this.count < this.capacity) {
      this.count += 1
    } else {
      this.head = (this.head + 1) % this.capacity
    }
  }

  public oldest(): T | undefined {
    if (this.count === 0) return undefined
    return this.slots[this.head]
  }

  public latest(): T | undefined {
    if (this.count === 0) return undefined
    return this.slots[(this.head + this.count - 1) % this.capacity]
  }

  public snapshot(): RingSnapshot<T> {
    const items = this.toArray()
    return {
      size: items.length,
      *[Symbol.iterator]() {
        yield* items
      }
    }
  }

  private toArray(): T[] {
    const out: T[] = []
    for (let i = 0; i < this.count; i += 1) {
      const item = this.slots[(this.head + i) % this.capacity]
      if (item !== undefined) out.push(item)
    }
    return out
  }
}
