import { expect, test } from "vitest"

import { LineSplitter, readLinesFromStream } from "../src/ui/lines.ts"

test("holds a partial line until its newline arrives", () => {
  const splitter = new LineSplitter()
  expect(splitter.push("ab")).toEqual([])
  expect(splitter.pending).toBe("ab")
  expect(splitter.push("c\nd\r\n")).toEqual(["abc", "d"])
  expect(splitter.pending).toBe("")
})

test("decodes multibyte characters split across chunks", () => {
  const bytes = new TextEncoder().encode("héllo\n")
  const splitter = new LineSplitter()
  // "é" is two bytes starting at offset 1
  expect(splitter.push(bytes.subarray(0, 2))).toEqual([])
  expect(splitter.push(bytes.subarray(2))).toEqual(["héllo"])
})

test("flush returns the unterminated rest once", () => {
  const splitter = new LineSplitter()
  splitter.push("done\ntail")
  expect(splitter.flush()).toBe("tail")
  expect(splitter.flush()).toBeNull()
})

test("reset drops held data", () => {
  const splitter = new LineSplitter()
  splitter.push("half")
  splitter.reset()
  expect(splitter.push("new\n")).toEqual(["new"])
})

test("readLinesFromStream yields every line including the last unterminated one", async () => {
  async function* chunks() {
    yield "a\nb"
    yield "c\n"
    yield "tail"
  }
  const lines: string[] = []
  for await (const line of readLinesFromStream(chunks())) lines.push(line)
  expect(lines).toEqual(["a", "bc", "tail"])
})

test("readLinesFromStream with no stream yields nothing", async () => {
  const lines: string[] = []
  for await (const line of readLinesFromStream(null)) lines.push(line)
  expect(lines).toEqual([])
})
