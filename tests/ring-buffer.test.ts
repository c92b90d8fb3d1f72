import { expect, test } from "vitest"

import { RingBuffer } from "../src/logcat/ring-buffer.ts"

test("default capacity is 10,000 and the oldest item is evicted first", () => {
  const buffer = new RingBuffer<number>()
  expect(buffer.capacity).toBe(10_000)

  for (let i = 1; i <= 10_001; i += 1) buffer.append(i)

  const items = [...buffer.snapshot()]
  expect(buffer.size).toBe(10_000)
  expect(items.length).toBe(10_000)
  expect(items[0]).toBe(2)
  expect(items[items.length - 1]).toBe(10_001)
  expect(buffer.latest()).toBe(10_001)
})

test("keeps insertion order across wrap-around", () => {
  const buffer = new RingBuffer<string>(3)
  for (const item of ["a", "b", "c", "d", "e"]) buffer.append(item)
  expect([...buffer.snapshot()]).toEqual(["c", "d", "e"])
  expect(buffer.oldest()).toBe("c")
})

test("a snapshot does not see later appends and can be iterated again", () => {
  const buffer = new RingBuffer<number>(4)
  buffer.append(1)
  buffer.append(2)

  const snap = buffer.snapshot()
  buffer.append(3)

  expect(snap.size).toBe(2)
  expect([...snap]).toEqual([1, 2])
  expect([...snap]).toEqual([1, 2])
  expect([...buffer.snapshot()]).toEqual([1, 2, 3])
})

test("empty buffer", () => {
  const buffer = new RingBuffer<number>(2)
  expect(buffer.size).toBe(0)
  expect(buffer.latest()).toBeUndefined()
  expect(buffer.oldest()).toBeUndefined()
  expect([...buffer.snapshot()]).toEqual([])
})

test("rejects a non-positive capacity", () => {
  expect(() => new RingBuffer<number>(0)).toThrow(RangeError)
  expect(() => new RingBuffer<number>(1.5)).toThrow(RangeError)
})
